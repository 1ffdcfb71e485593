import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { CollaboratorError } from '@valuation/domain';
import type { RawVehicleAttributes, RcLookupPort, RcLookupResult } from '@valuation/domain';

export interface RcLookupOptions {
  /** Full endpoint URL of the registration lookup provider. */
  url: string;
  token: string;
  timeoutMs: number;
  /** Overrides undici's global dispatcher (MockAgent in tests). */
  dispatcher?: Dispatcher;
}

const envelopeSchema = z.object({
  success: z.boolean().optional(),
  message: z.string().nullish(),
  data: z.record(z.unknown()).nullish(),
});

const text = z.string().nullish();

const rcDataSchema = z
  .object({
    rc_number: text,
    maker_description: text,
    maker_model: text,
    manufacturing_date_formatted: text,
    manufacturing_date: text,
    registration_date: text,
    fuel_type: text,
    registered_at: text,
    present_address: text,
    permanent_address: text,
    color: text,
    owner_number: z.union([z.string(), z.number()]).nullish(),
    body_type: text,
    vehicle_category_description: text,
    vehicle_category: text,
    cubic_capacity: z.union([z.string(), z.number()]).nullish(),
    norms_type: text,
  })
  .passthrough();

type RcData = z.infer<typeof rcDataSchema>;
type TextAttribute = Exclude<keyof RawVehicleAttributes, 'ownerCount' | 'odometer' | 'cubicCapacity'>;

function present(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Maps provider field names onto the normalizer's input shape. */
export function toRawAttributes(rcNumber: string, data: RcData): RawVehicleAttributes {
  const attrs: { -readonly [K in keyof RawVehicleAttributes]: RawVehicleAttributes[K] } = {};
  const rc = present(data.rc_number) ?? present(rcNumber);
  if (rc !== undefined) attrs.rcNumber = rc;
  const pairs: [TextAttribute, string | null | undefined][] = [
    ['make', data.maker_description],
    ['model', data.maker_model],
    ['manufacturingDate', data.manufacturing_date_formatted ?? data.manufacturing_date],
    ['registrationDate', data.registration_date],
    ['fuelType', data.fuel_type],
    ['registeredAt', data.registered_at],
    ['address', data.present_address ?? data.permanent_address],
    ['color', data.color],
    ['bodyType', data.body_type],
    ['vehicleCategory', data.vehicle_category_description ?? data.vehicle_category],
    ['normsType', data.norms_type],
  ];
  for (const [key, value] of pairs) {
    const v = present(value);
    if (v !== undefined) attrs[key] = v;
  }
  if (data.owner_number !== undefined && data.owner_number !== null) attrs.ownerCount = data.owner_number;
  if (data.cubic_capacity !== undefined && data.cubic_capacity !== null) {
    attrs.cubicCapacity = data.cubic_capacity;
  }
  return attrs;
}

/** Validates a provider-shaped record handed in by a caller instead of fetched. */
export function parseRcRecord(data: unknown, rcNumber = ''): RawVehicleAttributes {
  return toRawAttributes(rcNumber, rcDataSchema.parse(data));
}

/**
 * Registration lookup over HTTPS. Any failure surfaces as a 502-class
 * `CollaboratorError` carrying a fixed message; the upstream detail is logged.
 */
export class HttpRcLookupAdapter implements RcLookupPort {
  constructor(private readonly opts: RcLookupOptions) {}

  async fetchByRegistration(rcNumber: string): Promise<RcLookupResult> {
    const id = rcNumber.replace(/\s+/g, '').toUpperCase();

    let status: number;
    let body: unknown;
    try {
      const response = await fetch(this.opts.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.opts.token}`,
        },
        body: JSON.stringify({ id_number: id, enrich: true }),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
        dispatcher: this.opts.dispatcher,
      });
      status = response.status;
      body = status === 200 ? await response.json() : await response.text();
    } catch (err) {
      console.error(`[rc-lookup] request for ${id} failed:`, err);
      throw new CollaboratorError('rc-lookup', 'Vehicle registration lookup failed', { cause: err });
    }

    if (status !== 200) {
      console.error(`[rc-lookup] ${id}: HTTP ${status}`);
      throw new CollaboratorError('rc-lookup', `Vehicle registration lookup failed (HTTP ${status})`);
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success || envelope.data.success === false || !envelope.data.data) {
      const detail = envelope.success ? envelope.data.message ?? 'no data' : envelope.error.message;
      console.error(`[rc-lookup] ${id}: unusable response (${detail})`);
      throw new CollaboratorError('rc-lookup', 'Vehicle registration lookup returned no data');
    }

    const data = rcDataSchema.safeParse(envelope.data.data);
    if (!data.success) {
      console.error(`[rc-lookup] ${id}: unexpected record shape`, data.error.issues);
      throw new CollaboratorError('rc-lookup', 'Vehicle registration lookup returned no data');
    }

    return {
      rcNumber: id,
      attributes: toRawAttributes(id, data.data),
      raw: envelope.data.data,
    };
  }
}
