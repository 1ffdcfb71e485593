import type { VehicleAge } from '@valuation/domain';

export const KM_PER_MONTH = 1_000;

/**
 * Age from the manufacturing month to `asOf`, in whole months. Day of month is
 * ignored on both sides; a manufacturing month in the future counts as age 0.
 */
export function computeVehicleAge(
  manufacturingYear: string,
  manufacturingMonth: number,
  asOf: Date,
): VehicleAge {
  const year = parseInt(manufacturingYear, 10);
  const elapsed =
    (asOf.getUTCFullYear() - year) * 12 + (asOf.getUTCMonth() + 1 - manufacturingMonth);
  const totalMonths = Math.max(0, elapsed);
  const years = Math.floor(totalMonths / 12);
  const months = totalMonths % 12;
  return {
    years,
    months,
    totalMonths,
    ageYears: years + months / 12,
    label: `${years} years ${months} months`,
  };
}

/** Standard running assumption when no odometer reading is available. */
export function estimateOdometer(totalMonths: number): number {
  return totalMonths * KM_PER_MONTH;
}
