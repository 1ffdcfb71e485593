import type { ReferencePriceKind, ResaleValuation, VehicleRecord } from '@valuation/domain';
import type { LifecycleFlags, ValuationContext } from './context.js';
import { converge, NEGOTIATION_GAP_PERCENT } from './convergence.js';
import { dealerPurchasePrice, OWNER_RULES } from './dealer-economics.js';
import {
  bookValue,
  estimateHistoricalPrice,
  MAX_RESALE_DEPRECIATION_PERCENT,
  RESALE_SCHEDULE,
  resolveDepreciation,
  usageAdjustment,
} from './depreciation.js';
import { MARKET_INTELLIGENCE_RULES } from './market-intelligence.js';
import { round2 } from './money.js';
import { REGIONAL_RULES } from './regional.js';
import { applyRules } from './rules.js';
import { computeVehicleAge, estimateOdometer } from './vehicle-age.js';

export interface ResalePricing {
  referencePrice: number;
  /**
   * `current` = today's ex-showroom price, walked back to the manufacturing
   * year before depreciation. `historical` = already a manufacturing-year price.
   */
  referencePriceKind: ReferencePriceKind;
  marketListingsMean?: number;
  marketListingCount?: number;
  lifecycle?: LifecycleFlags;
}

/**
 * Depreciation → owner penalty → market intelligence → regional → convergence
 * → dealer economics. Pure: the same record, pricing and `asOf` always give the
 * same numbers.
 */
export function computeResaleValuation(
  record: VehicleRecord,
  pricing: ResalePricing,
  asOf: Date,
): ResaleValuation {
  const age = computeVehicleAge(record.manufacturingYear, record.manufacturingMonth, asOf);
  const odometerEstimated = record.odometer === undefined;
  const odometer = record.odometer ?? estimateOdometer(age.totalMonths);

  const gridPercent = resolveDepreciation(RESALE_SCHEDULE, age.totalMonths);
  const usagePercent = usageAdjustment(record.odometer, age.ageYears);
  const depreciationPercent = Math.min(gridPercent + usagePercent, MAX_RESALE_DEPRECIATION_PERCENT);

  const historicalPrice =
    pricing.referencePriceKind === 'current'
      ? estimateHistoricalPrice(pricing.referencePrice, age.ageYears)
      : pricing.referencePrice;
  const baseBookValue = bookValue(historicalPrice, depreciationPercent);

  const ctx: ValuationContext = { record, age, lifecycle: pricing.lifecycle ?? {} };
  const owner = applyRules(baseBookValue, OWNER_RULES, ctx);
  const market = applyRules(owner.value, MARKET_INTELLIGENCE_RULES, ctx);
  const regional = applyRules(market.value, REGIONAL_RULES, ctx);

  const convergence = converge(
    regional.value,
    { mean: pricing.marketListingsMean, count: pricing.marketListingCount },
    age.totalMonths,
  );
  const dealer = dealerPurchasePrice(convergence.fairMarketRetailValue, record.bodyType);

  return {
    fairMarketRetailValue: round2(convergence.fairMarketRetailValue),
    dealerPurchasePrice: round2(dealer.price),
    bodyType: record.bodyType,
    metadata: {
      vehicleAge: age.label,
      vehicleAgeMonths: age.totalMonths,
      vehicleAgeYears: round2(age.ageYears),
      estimatedOdometer: odometer,
      odometerEstimated,
      referencePrice: pricing.referencePrice,
      referencePriceKind: pricing.referencePriceKind,
      historicalReferencePrice: round2(historicalPrice),
      gridDepreciationPercent: gridPercent,
      usageAdjustmentPercent: usagePercent,
      baseDepreciationPercent: depreciationPercent,
      bookValue: round2(baseBookValue),
      ownerFactor: owner.factor,
      marketFactor: market.factor,
      regionalAdjustmentFactor: regional.factor,
      adjustedBookValue: round2(regional.value),
      marketListingsMean: pricing.marketListingsMean ?? null,
      marketWeight: convergence.marketWeight,
      blendedValue: round2(convergence.blendedValue),
      negotiationGapPercent: NEGOTIATION_GAP_PERCENT,
      dealerMarginPercent: dealer.terms.marginPercent,
      refurbCost: dealer.terms.refurbCost,
      appliedRules: [...owner.applied, ...market.applied, ...regional.applied],
    },
  };
}
