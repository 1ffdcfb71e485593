import type { CacheRecord, SimilarVehicle } from '../../entities/cache-record.js';
import type { BodyType, FuelType, RawVehicleAttributes, VehicleClass, VehicleRecord } from '../../entities/vehicle.js';
import type { IdvValuation, ResaleValuation, ValidationStatus } from '../../entities/valuation-result.js';

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export interface MarketSignals {
  marketListingsMean?: number;
  marketListingCount?: number;
  /** Overrides the built-in lifecycle catalog when set. */
  discontinued?: boolean;
  newGenerationLaunched?: boolean;
}

export interface ManualValuationCommand extends MarketSignals {
  vehicle: RawVehicleAttributes;
  currentExShowroom: number;
}

export interface RegistrationValuationCommand extends MarketSignals {
  rcNumber: string;
  currentExShowroom: number;
}

export interface IdvCalculationCommand {
  vehicle: RawVehicleAttributes;
  onRoadPrice: number;
  marketMedianEstimate?: number;
}

export interface RegistrationIdvCommand {
  rcNumber: string;
  onRoadPrice: number;
  marketMedianEstimate?: number;
}

export interface PriceDiscoveryIdvCommand {
  rcNumber: string;
  skipCache?: boolean;
}

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

export interface ResaleOutcome {
  vehicle: VehicleRecord;
  valuation: ResaleValuation;
}

export interface RegistrationResaleOutcome extends ResaleOutcome {
  rcNumber: string;
  rcDetails: Record<string, unknown>;
}

export type BatchItemOutcome =
  | { index: number; success: true; data: ResaleOutcome }
  | { index: number; success: false; error: string };

export interface IdvOutcome {
  vehicle: VehicleRecord;
  valuation: IdvValuation;
}

/** Flattened IDV report returned by the price-discovery flow, cached or fresh. */
export interface IdvReport {
  vehicleMake: string;
  vehicleModel: string;
  fullModel: string;
  variant: string | null;
  manufacturingYear: string;
  city: string;
  vehicleClass: VehicleClass;
  fuelType: FuelType;
  bodyType: BodyType;
  ownerCount: number;
  vehicleAge: string;
  vehicleAgeMonths: number;
  estimatedOdometer: number;
  onRoadPrice: number;
  marketMedianEstimate: number | null;
  depreciationPercent: number;
  calculatedIdv: number;
  bookValue: number;
  fairMarketRetailValue: number;
  dealerPurchasePrice: number;
  differencePercent: number | null;
  validationStatus: ValidationStatus;
  confidenceScore: number;
  confidenceHint: number | null;
  aiModel: string | null;
  computedAt: Date;
}

export interface PriceDiscoveryIdvOutcome {
  source: 'cache' | 'computed';
  cached: boolean;
  rcNumber: string;
  rcDetails: Record<string, unknown>;
  idv: IdvReport;
  /** Other stored valuations of the same model, year and fuel in the same state. */
  similarVehicles: SimilarVehicle[];
}

export interface RegistrationDetails {
  rcNumber: string;
  vehicle: VehicleRecord;
  rcDetails: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface ValuationUseCasePort {
  valueManual(cmd: ManualValuationCommand): ResaleOutcome;
  valueBatch(cmds: ManualValuationCommand[]): BatchItemOutcome[];
  valueFromRegistration(cmd: RegistrationValuationCommand): Promise<RegistrationResaleOutcome>;
  calculateIdv(cmd: IdvCalculationCommand): IdvOutcome;
  idvFromRegistration(cmd: RegistrationIdvCommand): Promise<IdvOutcome & { rcNumber: string }>;
  idvWithPriceDiscovery(cmd: PriceDiscoveryIdvCommand): Promise<PriceDiscoveryIdvOutcome>;
  lookupRegistration(rcNumber: string): Promise<RegistrationDetails>;
  history(rcNumber: string): Promise<CacheRecord[]>;
  recent(limit: number): Promise<CacheRecord[]>;
}
