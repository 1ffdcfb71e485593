import type { IdvValuation, VehicleRecord } from '@valuation/domain';
import type { ValuationContext } from './context.js';
import { OWNER_RULES } from './dealer-economics.js';
import { bookValue, electricVehicleValue, idvScheduleFor, resolveDepreciation } from './depreciation.js';
import { validateIdv } from './idv-validator.js';
import { round2 } from './money.js';
import { applyRules } from './rules.js';
import { computeVehicleAge, estimateOdometer } from './vehicle-age.js';

export interface IdvPricing {
  /** Manufacturing-year on-road price; used as-is, never reverse-inflated. */
  onRoadPrice: number;
  marketMedianEstimate?: number | null;
}

export function computeIdv(record: VehicleRecord, pricing: IdvPricing, asOf: Date): IdvValuation {
  const age = computeVehicleAge(record.manufacturingYear, record.manufacturingMonth, asOf);
  const depreciationPercent = resolveDepreciation(idvScheduleFor(record.vehicleClass), age.totalMonths);

  let depreciatedValue: number;
  let accessoryDepreciationPercent: number | null = null;
  if (record.fuelType === 'Electric') {
    const ev = electricVehicleValue(pricing.onRoadPrice, depreciationPercent);
    depreciatedValue = ev.value;
    accessoryDepreciationPercent = ev.accessoryDepreciationPercent;
  } else {
    depreciatedValue = bookValue(pricing.onRoadPrice, depreciationPercent);
  }

  const ctx: ValuationContext = { record, age, lifecycle: {} };
  const owner = applyRules(depreciatedValue, OWNER_RULES, ctx);
  const calculatedIdv = round2(owner.value);
  const validation = validateIdv(calculatedIdv, pricing.marketMedianEstimate);

  return {
    calculatedIdv,
    depreciationPercent,
    marketMedianEstimate: pricing.marketMedianEstimate ?? null,
    differencePercent: validation.differencePercent,
    validationStatus: validation.validationStatus,
    confidenceScore: validation.confidenceScore,
    metadata: {
      vehicleAge: age.label,
      vehicleAgeMonths: age.totalMonths,
      estimatedOdometer: record.odometer ?? estimateOdometer(age.totalMonths),
      vehicleClass: record.vehicleClass,
      fuelType: record.fuelType,
      onRoadPrice: pricing.onRoadPrice,
      accessoryDepreciationPercent,
      ownerFactor: owner.factor,
      appliedRules: owner.applied,
    },
  };
}
