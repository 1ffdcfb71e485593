import type { AppliedRule } from './adjustment-rule.js';
import type { BodyType, FuelType, VehicleClass } from './vehicle.js';

export const VALIDATION_STATUSES = [
  'Within Acceptable Range',
  'Manual Review Required',
  'No Market Data',
] as const;
export type ValidationStatus = (typeof VALIDATION_STATUSES)[number];

export type ReferencePriceKind = 'current' | 'historical';

export interface ResaleMetadata {
  readonly vehicleAge: string;
  readonly vehicleAgeMonths: number;
  readonly vehicleAgeYears: number;
  readonly estimatedOdometer: number;
  readonly odometerEstimated: boolean;
  readonly referencePrice: number;
  readonly referencePriceKind: ReferencePriceKind;
  readonly historicalReferencePrice: number;
  readonly gridDepreciationPercent: number;
  readonly usageAdjustmentPercent: number;
  readonly baseDepreciationPercent: number;
  readonly bookValue: number;
  readonly ownerFactor: number;
  readonly marketFactor: number;
  readonly regionalAdjustmentFactor: number;
  readonly adjustedBookValue: number;
  readonly marketListingsMean: number | null;
  readonly marketWeight: number;
  readonly blendedValue: number;
  readonly negotiationGapPercent: number;
  readonly dealerMarginPercent: number;
  readonly refurbCost: number;
  readonly appliedRules: readonly AppliedRule[];
}

export interface ResaleValuation {
  readonly fairMarketRetailValue: number;
  readonly dealerPurchasePrice: number;
  readonly bodyType: BodyType;
  readonly metadata: ResaleMetadata;
}

export interface IdvMetadata {
  readonly vehicleAge: string;
  readonly vehicleAgeMonths: number;
  readonly estimatedOdometer: number;
  readonly vehicleClass: VehicleClass;
  readonly fuelType: FuelType;
  readonly onRoadPrice: number;
  readonly accessoryDepreciationPercent: number | null;
  readonly ownerFactor: number;
  readonly appliedRules: readonly AppliedRule[];
}

export interface IdvValuation {
  readonly calculatedIdv: number;
  readonly depreciationPercent: number;
  readonly marketMedianEstimate: number | null;
  readonly differencePercent: number | null;
  readonly validationStatus: ValidationStatus;
  readonly confidenceScore: number;
  readonly metadata: IdvMetadata;
}
