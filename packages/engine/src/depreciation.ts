import type {
  DepreciationBand,
  DepreciationSchedule,
  DepreciationScheduleId,
  VehicleClass,
} from '@valuation/domain';

function band(lowerMonths: number, upperMonths: number, percent: number): DepreciationBand {
  return { lowerMonths, upperMonths, percent };
}

/**
 * Rejects a schedule that does not partition [0, ∞) in order, or whose percent
 * ever decreases with age.
 */
export function defineSchedule(
  id: DepreciationScheduleId,
  bands: readonly DepreciationBand[],
): DepreciationSchedule {
  let expectedLower = 0;
  let previousPercent = -Infinity;
  for (const b of bands) {
    if (b.lowerMonths !== expectedLower || b.upperMonths <= b.lowerMonths) {
      throw new Error(`Schedule ${id}: band starting at ${b.lowerMonths} months breaks the partition`);
    }
    if (b.percent < previousPercent) {
      throw new Error(`Schedule ${id}: percent decreases at ${b.lowerMonths} months`);
    }
    expectedLower = b.upperMonths;
    previousPercent = b.percent;
  }
  if (expectedLower !== Infinity) {
    throw new Error(`Schedule ${id}: last band must be open-ended`);
  }
  return { id, bands: Object.freeze([...bands]) };
}

export const RESALE_SCHEDULE = defineSchedule('resale', [
  band(0, 6, 5),
  band(6, 12, 10),
  band(12, 24, 18),
  band(24, 36, 25),
  band(36, 48, 30),
  band(48, 60, 35),
  band(60, 72, 40),
  band(72, 84, 45),
  band(84, 96, 50),
  band(96, Infinity, 60),
]);

export const IDV_TWO_WHEELER_SCHEDULE = defineSchedule('idv-2w', [
  band(0, 6, 5),
  band(6, 12, 15),
  band(12, 24, 20),
  band(24, 36, 30),
  band(36, 48, 40),
  band(48, 60, 50),
  band(60, 84, 60),
  band(84, Infinity, 65),
]);

export const IDV_FOUR_WHEELER_SCHEDULE = defineSchedule('idv-4w', [
  band(0, 6, 5),
  band(6, 12, 15),
  band(12, 24, 20),
  band(24, 36, 30),
  band(36, 48, 40),
  band(48, 60, 50),
  band(60, 84, 55),
  band(84, 120, 65),
  band(120, Infinity, 70),
]);

export function idvScheduleFor(vehicleClass: VehicleClass): DepreciationSchedule {
  return vehicleClass === '2W' ? IDV_TWO_WHEELER_SCHEDULE : IDV_FOUR_WHEELER_SCHEDULE;
}

/** Step lookup; an age exactly on a boundary falls in the older band. */
export function resolveDepreciation(schedule: DepreciationSchedule, ageMonths: number): number {
  const age = Math.max(0, ageMonths);
  const match = schedule.bands.find((b) => age >= b.lowerMonths && age < b.upperMonths);
  if (!match) throw new Error(`Schedule ${schedule.id} has no band for ${ageMonths} months`);
  return match.percent;
}

export function bookValue(referencePrice: number, depreciationPercent: number): number {
  return referencePrice * (1 - depreciationPercent / 100);
}

// ─── Resale refinements ───────────────────────────────────────────────────────

export const REVERSE_INFLATION_PER_YEAR = 0.03;
export const MAX_RESALE_DEPRECIATION_PERCENT = 75;

/** Today's ex-showroom price walked back to the manufacturing year. */
export function estimateHistoricalPrice(currentPrice: number, ageYears: number): number {
  return Math.max(0, currentPrice * (1 - REVERSE_INFLATION_PER_YEAR * ageYears));
}

/**
 * Points added to the grid percent for an actual odometer reading:
 * heavy use (> 15,000 km/yr) +5, light use (< 6,000 km/yr) −3.
 */
export function usageAdjustment(odometer: number | undefined, ageYears: number): number {
  if (odometer === undefined || ageYears <= 0) return 0;
  const annualKm = odometer / ageYears;
  if (annualKm > 15_000) return 5;
  if (annualKm < 6_000) return -3;
  return 0;
}

// ─── EV split ─────────────────────────────────────────────────────────────────

export const EV_ACCESSORY_SHARE = 0.15;
export const EV_ACCESSORY_EXTRA_PERCENT = 10;
export const EV_ACCESSORY_MAX_PERCENT = 80;

/**
 * EV insured value: 85% body at the grid rate plus 15% battery/charger
 * accessories depreciated 10 points faster (capped at 80%).
 */
export function electricVehicleValue(
  onRoadPrice: number,
  depreciationPercent: number,
): { value: number; accessoryDepreciationPercent: number } {
  const accessoryDepreciationPercent = Math.min(
    depreciationPercent + EV_ACCESSORY_EXTRA_PERCENT,
    EV_ACCESSORY_MAX_PERCENT,
  );
  const body = bookValue(onRoadPrice * (1 - EV_ACCESSORY_SHARE), depreciationPercent);
  const accessories = bookValue(onRoadPrice * EV_ACCESSORY_SHARE, accessoryDepreciationPercent);
  return { value: body + accessories, accessoryDepreciationPercent };
}
