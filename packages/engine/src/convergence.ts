export const NEGOTIATION_GAP_PERCENT = 7;
export const RELIABLE_MARKET_WEIGHT = 0.7;
export const DEFAULT_MARKET_WEIGHT = 0.5;
export const RELIABLE_LISTING_COUNT = 3;
export const RELIABLE_MARKET_MAX_AGE_MONTHS = 60;

export interface MarketSample {
  mean?: number;
  count?: number;
}

export interface ConvergenceResult {
  blendedValue: number;
  /** 0 when no listing mean was supplied. */
  marketWeight: number;
  fairMarketRetailValue: number;
}

/**
 * With a listing count, three or more listings make the sample reliable.
 * Without one, vehicles under five years old are assumed to have a dense
 * enough market.
 */
export function isReliableSample(sample: MarketSample, ageMonths: number): boolean {
  if (sample.count !== undefined) return sample.count >= RELIABLE_LISTING_COUNT;
  return ageMonths < RELIABLE_MARKET_MAX_AGE_MONTHS;
}

export function converge(
  adjustedBookValue: number,
  sample: MarketSample,
  ageMonths: number,
): ConvergenceResult {
  let blendedValue = adjustedBookValue;
  let marketWeight = 0;
  if (sample.mean !== undefined && sample.mean > 0) {
    marketWeight = isReliableSample(sample, ageMonths) ? RELIABLE_MARKET_WEIGHT : DEFAULT_MARKET_WEIGHT;
    blendedValue = sample.mean * marketWeight + adjustedBookValue * (1 - marketWeight);
  }
  return {
    blendedValue,
    marketWeight,
    fairMarketRetailValue: blendedValue * (1 - NEGOTIATION_GAP_PERCENT / 100),
  };
}
