import type { FuelType, VehicleClass } from './vehicle.js';
import type { ValidationStatus } from './valuation-result.js';

export interface CacheKey {
  readonly make: string;
  readonly baseModel: string;
  readonly manufacturingYear: string;
  readonly city: string;
}

/** One persisted IDV computation. Rows are inserted, never updated. */
export interface CacheRecord extends CacheKey {
  readonly id: string;
  readonly rcNumber: string;
  readonly fullModel: string;
  /** Registering state; not part of the key. */
  readonly state: string | null;
  readonly fuelType: FuelType;
  readonly vehicleClass: VehicleClass;
  readonly ownerCount: number;
  readonly calculatedIdv: number;
  readonly depreciationPercent: number;
  readonly bookValue: number;
  readonly fairMarketRetailValue: number;
  readonly dealerPurchasePrice: number;
  readonly onRoadPrice: number;
  readonly marketMedianEstimate: number | null;
  readonly variantGuess: string | null;
  readonly confidenceHint: number | null;
  readonly validationStatus: ValidationStatus;
  readonly differencePercent: number | null;
  readonly confidenceScore: number;
  readonly aiModel: string | null;
  readonly createdAt: Date;
}

export type NewCacheRecord = Omit<CacheRecord, 'id'>;

/** Stored valuations of the same model, year and fuel registered in the same state. */
export interface SimilarVehicleQuery {
  readonly baseModel: string;
  readonly manufacturingYear: string;
  readonly fuelType: FuelType;
  /** null matches every state. */
  readonly state: string | null;
  /** Left out of the result, usually the registration being valued. */
  readonly excludeRcNumber?: string;
}

export const SIMILAR_VEHICLES_LIMIT = 5;

export type SimilarVehicle = Pick<
  CacheRecord,
  | 'rcNumber'
  | 'fullModel'
  | 'manufacturingYear'
  | 'fuelType'
  | 'city'
  | 'state'
  | 'calculatedIdv'
  | 'fairMarketRetailValue'
  | 'dealerPurchasePrice'
  | 'createdAt'
>;

export const CACHE_VALIDITY_DAYS = 90;

/** Keys compare case-insensitively; every store keeps them in this form. */
export function normalizeCacheKey(key: CacheKey): CacheKey {
  return {
    make: key.make.trim().toUpperCase(),
    baseModel: key.baseModel.trim().toUpperCase(),
    manufacturingYear: key.manufacturingYear.trim(),
    city: key.city.trim().toUpperCase(),
  };
}
