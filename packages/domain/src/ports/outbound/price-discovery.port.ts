import type { VehicleRecord } from '../../entities/vehicle.js';

export type PriceDiscoveryRequest = Pick<
  VehicleRecord,
  | 'make'
  | 'baseModel'
  | 'fullModel'
  | 'variant'
  | 'fuelType'
  | 'manufacturingYear'
  | 'city'
  | 'vehicleClass'
  | 'engineCapacityCc'
  | 'emissionNorm'
>;

/** Untrusted suggestions; the IDV validator decides how far to believe them. */
export interface PriceDiscoveryResult {
  readonly onRoadPrice: number;
  readonly marketMedianEstimate: number | null;
  readonly variantGuess: string | null;
  readonly confidenceHint: number | null;
  readonly model: string;
}

export interface PriceDiscoveryPort {
  discoverPrices(request: PriceDiscoveryRequest): Promise<PriceDiscoveryResult>;
}
