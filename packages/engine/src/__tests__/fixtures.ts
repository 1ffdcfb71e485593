import type { VehicleRecord } from '@valuation/domain';
import type { LifecycleFlags, ValuationContext } from '../context.js';
import { computeVehicleAge } from '../vehicle-age.js';

export const AS_OF = new Date('2024-09-15T10:00:00.000Z');

export function makeRecord(overrides: Partial<VehicleRecord> = {}): VehicleRecord {
  return {
    make: 'MARUTI SUZUKI',
    baseModel: 'SWIFT',
    fullModel: 'SWIFT VXI',
    fuelType: 'Petrol',
    manufacturingYear: '2019',
    manufacturingMonth: 3,
    registrationCode: 'DL3C',
    city: 'DELHI',
    bodyType: 'Hatchback',
    vehicleClass: '4W',
    color: 'White',
    ownerCount: 1,
    ...overrides,
  };
}

export function makeContext(
  overrides: Partial<VehicleRecord> = {},
  lifecycle: LifecycleFlags = {},
): ValuationContext {
  const record = makeRecord(overrides);
  return {
    record,
    age: computeVehicleAge(record.manufacturingYear, record.manufacturingMonth, AS_OF),
    lifecycle,
  };
}
