import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { BaseMessage } from '@langchain/core/messages';
import { z } from 'zod';
import { CollaboratorError } from '@valuation/domain';
import type {
  PriceDiscoveryPort,
  PriceDiscoveryRequest,
  PriceDiscoveryResult,
} from '@valuation/domain';

/** The slice of a LangChain chat model this adapter calls. */
export interface ChatModelLike {
  invoke(messages: BaseMessage[]): Promise<{ content: unknown }>;
}

const SYSTEM_PROMPT = `You are a pricing researcher for the Indian used-vehicle market.

Given a vehicle description, report:
- on_road_price: the on-road price in INR of this model when new, in its manufacturing year and city.
- market_median_estimate: the median asking price in INR of comparable used listings in that city today, or null if you cannot tell.
- variant: the most likely variant name, or null.
- confidence: your confidence in these figures from 0 to 100, or null.

Do not compute depreciation or insured value. Respond with a single JSON object and nothing else:
{"on_road_price": 0, "market_median_estimate": 0, "variant": null, "confidence": null}`;

const amount = z.union([z.number(), z.string().regex(/^\s*\d+(\.\d+)?\s*$/).transform(Number)]);

const responseSchema = z.object({
  on_road_price: amount.pipe(z.number().positive()),
  market_median_estimate: amount.nullish().transform((v) => (v && v > 0 ? v : null)),
  variant: z.string().nullish().transform((v) => (v?.trim() ? v.trim() : null)),
  confidence: amount.nullish().transform((v) => (v === null || v === undefined ? null : Math.min(100, Math.max(0, v)))),
});

const contentSchema = z.union([
  z.string(),
  z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
]);

function contentText(content: unknown): string {
  const parsed = contentSchema.parse(content);
  if (typeof parsed === 'string') return parsed;
  return parsed.map((part) => part.text ?? '').join('');
}

/** Removes a surrounding ```json fence if the model added one. */
export function stripCodeFence(text: string): string {
  let cleaned = text.trim();
  cleaned = cleaned.replace(/^```(?:json)?\s*/i, '');
  cleaned = cleaned.replace(/\s*```$/, '');
  return cleaned.trim();
}

export function describeVehicle(req: PriceDiscoveryRequest): string {
  const lines = [
    `Vehicle class: ${req.vehicleClass === '2W' ? 'two-wheeler' : 'four-wheeler'}`,
    `Manufacturer: ${req.make}`,
    `Model: ${req.fullModel}`,
    `Fuel: ${req.fuelType}`,
    `Manufacturing year: ${req.manufacturingYear}`,
    `City: ${req.city || 'unknown'}`,
  ];
  if (req.variant) lines.push(`Variant: ${req.variant}`);
  if (req.engineCapacityCc !== undefined) lines.push(`Engine capacity: ${req.engineCapacityCc} cc`);
  if (req.emissionNorm) lines.push(`Emission norm: ${req.emissionNorm}`);
  return lines.join('\n');
}

/**
 * Price discovery through a chat model. The model only suggests prices; the
 * IDV itself is always computed locally from these inputs.
 */
export class LlmPriceDiscoveryAdapter implements PriceDiscoveryPort {
  constructor(
    private readonly model: ChatModelLike,
    private readonly modelName: string,
  ) {}

  async discoverPrices(request: PriceDiscoveryRequest): Promise<PriceDiscoveryResult> {
    let reply: { content: unknown };
    try {
      reply = await this.model.invoke([
        new SystemMessage(SYSTEM_PROMPT),
        new HumanMessage(describeVehicle(request)),
      ]);
    } catch (err) {
      console.error(`[price-discovery] ${this.modelName} call failed:`, err);
      throw new CollaboratorError('price-discovery', 'Price discovery failed', { cause: err });
    }

    let parsed: z.infer<typeof responseSchema>;
    try {
      const json: unknown = JSON.parse(stripCodeFence(contentText(reply.content)));
      parsed = responseSchema.parse(json);
    } catch (err) {
      console.error(`[price-discovery] ${this.modelName} returned unusable output:`, err);
      throw new CollaboratorError('price-discovery', 'Price discovery returned an unusable response', {
        cause: err,
      });
    }

    console.log(
      `[price-discovery] ${request.make} ${request.baseModel} ${request.manufacturingYear}: ` +
        `on-road ${parsed.on_road_price}, median ${parsed.market_median_estimate ?? 'n/a'}`,
    );
    return {
      onRoadPrice: parsed.on_road_price,
      marketMedianEstimate: parsed.market_median_estimate,
      variantGuess: parsed.variant,
      confidenceHint: parsed.confidence,
      model: this.modelName,
    };
  }
}
