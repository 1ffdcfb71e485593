import type { VehicleAge, VehicleRecord } from '@valuation/domain';

export interface LifecycleFlags {
  discontinued?: boolean;
  newGenerationLaunched?: boolean;
}

/** What every adjustment rule is evaluated against. */
export interface ValuationContext {
  readonly record: VehicleRecord;
  readonly age: VehicleAge;
  readonly lifecycle: LifecycleFlags;
}
