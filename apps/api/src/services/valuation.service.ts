import {
  CredentialError,
  ValidationError,
  ValuationError,
} from '@valuation/domain';
import type {
  BatchItemOutcome,
  CacheKey,
  CacheRecord,
  ClockPort,
  IdvCalculationCommand,
  IdvOutcome,
  IdvReport,
  ManualValuationCommand,
  MarketSignals,
  NewCacheRecord,
  PriceDiscoveryIdvCommand,
  PriceDiscoveryIdvOutcome,
  PriceDiscoveryPort,
  PriceDiscoveryRequest,
  RcLookupPort,
  RcLookupResult,
  RegistrationDetails,
  RegistrationIdvCommand,
  RegistrationResaleOutcome,
  RegistrationValuationCommand,
  ResaleOutcome,
  SimilarVehicle,
  ValuationStorePort,
  ValuationUseCasePort,
  VehicleRecord,
} from '@valuation/domain';
import {
  computeIdv,
  computeResaleValuation,
  computeVehicleAge,
  estimateOdometer,
  normalizeVehicle,
} from '@valuation/engine';
import type { LifecycleFlags, ResalePricing } from '@valuation/engine';

export interface ValuationServiceDeps {
  store: ValuationStorePort;
  /** null when no RC_API_TOKEN is configured. */
  rcLookup: RcLookupPort | null;
  /** null when the selected AI provider has no credential. */
  priceDiscovery: PriceDiscoveryPort | null;
  clock: ClockPort;
}

function requirePositive(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive number`);
  }
}

function lifecycleOf(signals: MarketSignals): LifecycleFlags {
  const lifecycle: LifecycleFlags = {};
  if (signals.discontinued !== undefined) lifecycle.discontinued = signals.discontinued;
  if (signals.newGenerationLaunched !== undefined) {
    lifecycle.newGenerationLaunched = signals.newGenerationLaunched;
  }
  return lifecycle;
}

function resalePricing(referencePrice: number, signals: MarketSignals): ResalePricing {
  return {
    referencePrice,
    referencePriceKind: 'current',
    marketListingsMean: signals.marketListingsMean,
    marketListingCount: signals.marketListingCount,
    lifecycle: lifecycleOf(signals),
  };
}

function discoveryRequest(record: VehicleRecord): PriceDiscoveryRequest {
  return {
    make: record.make,
    baseModel: record.baseModel,
    fullModel: record.fullModel,
    variant: record.variant,
    fuelType: record.fuelType,
    manufacturingYear: record.manufacturingYear,
    city: record.city,
    vehicleClass: record.vehicleClass,
    engineCapacityCc: record.engineCapacityCc,
    emissionNorm: record.emissionNorm,
  };
}

/**
 * A stored entry keeps every monetary figure as computed. Age and odometer are
 * recomputed for the vehicle being asked about, as of now.
 */
export function reportFromCache(cached: NewCacheRecord, record: VehicleRecord, now: Date): IdvReport {
  const age = computeVehicleAge(record.manufacturingYear, record.manufacturingMonth, now);
  return {
    vehicleMake: record.make,
    vehicleModel: record.baseModel,
    fullModel: record.fullModel,
    variant: cached.variantGuess ?? record.variant ?? null,
    manufacturingYear: record.manufacturingYear,
    city: record.city,
    vehicleClass: record.vehicleClass,
    fuelType: record.fuelType,
    bodyType: record.bodyType,
    ownerCount: record.ownerCount,
    vehicleAge: age.label,
    vehicleAgeMonths: age.totalMonths,
    estimatedOdometer: record.odometer ?? estimateOdometer(age.totalMonths),
    onRoadPrice: cached.onRoadPrice,
    marketMedianEstimate: cached.marketMedianEstimate,
    depreciationPercent: cached.depreciationPercent,
    calculatedIdv: cached.calculatedIdv,
    bookValue: cached.bookValue,
    fairMarketRetailValue: cached.fairMarketRetailValue,
    dealerPurchasePrice: cached.dealerPurchasePrice,
    differencePercent: cached.differencePercent,
    validationStatus: cached.validationStatus,
    confidenceScore: cached.confidenceScore,
    confidenceHint: cached.confidenceHint,
    aiModel: cached.aiModel,
    computedAt: cached.createdAt,
  };
}

export class ValuationService implements ValuationUseCasePort {
  constructor(private readonly deps: ValuationServiceDeps) {}

  // ─── Resale ────────────────────────────────────────────────────────────────

  valueManual(cmd: ManualValuationCommand): ResaleOutcome {
    requirePositive(cmd.currentExShowroom, 'current_ex_showroom');
    const { record } = normalizeVehicle(cmd.vehicle);
    const valuation = computeResaleValuation(
      record,
      resalePricing(cmd.currentExShowroom, cmd),
      this.deps.clock.now(),
    );
    return { vehicle: record, valuation };
  }

  /** Items are independent: one bad vehicle never fails the batch. */
  valueBatch(cmds: ManualValuationCommand[]): BatchItemOutcome[] {
    return cmds.map((cmd, index): BatchItemOutcome => {
      try {
        return { index, success: true, data: this.valueManual(cmd) };
      } catch (err) {
        if (err instanceof ValuationError) {
          return { index, success: false, error: err.message };
        }
        console.error(`[valuation] batch item ${index} failed`, err);
        return { index, success: false, error: 'Internal error' };
      }
    });
  }

  async valueFromRegistration(cmd: RegistrationValuationCommand): Promise<RegistrationResaleOutcome> {
    requirePositive(cmd.currentExShowroom, 'current_ex_showroom');
    const lookup = await this.fetchRegistration(cmd.rcNumber);
    const { record } = normalizeVehicle(lookup.attributes);
    const valuation = computeResaleValuation(
      record,
      resalePricing(cmd.currentExShowroom, cmd),
      this.deps.clock.now(),
    );
    return { rcNumber: lookup.rcNumber, rcDetails: lookup.raw, vehicle: record, valuation };
  }

  // ─── IDV ───────────────────────────────────────────────────────────────────

  calculateIdv(cmd: IdvCalculationCommand): IdvOutcome {
    requirePositive(cmd.onRoadPrice, 'original_on_road_price');
    const { record } = normalizeVehicle(cmd.vehicle);
    const valuation = computeIdv(
      record,
      { onRoadPrice: cmd.onRoadPrice, marketMedianEstimate: cmd.marketMedianEstimate },
      this.deps.clock.now(),
    );
    return { vehicle: record, valuation };
  }

  async idvFromRegistration(cmd: RegistrationIdvCommand): Promise<IdvOutcome & { rcNumber: string }> {
    requirePositive(cmd.onRoadPrice, 'original_on_road_price');
    const lookup = await this.fetchRegistration(cmd.rcNumber);
    const { record } = normalizeVehicle(lookup.attributes);
    const valuation = computeIdv(
      record,
      { onRoadPrice: cmd.onRoadPrice, marketMedianEstimate: cmd.marketMedianEstimate },
      this.deps.clock.now(),
    );
    return { rcNumber: lookup.rcNumber, vehicle: record, valuation };
  }

  /**
   * Lookup → normalize → cache → (on miss) price discovery, IDV and a resale
   * estimate → cache write. `skipCache` forces a fresh computation, which is
   * still written.
   */
  async idvWithPriceDiscovery(cmd: PriceDiscoveryIdvCommand): Promise<PriceDiscoveryIdvOutcome> {
    const lookup = await this.fetchRegistration(cmd.rcNumber);
    const { record, cacheKey } = normalizeVehicle(lookup.attributes);
    const now = this.deps.clock.now();

    if (!cmd.skipCache) {
      const cached = await this.readCache(cacheKey, now);
      if (cached) {
        console.log(
          `[idv-cache] hit for ${lookup.rcNumber} (${cacheKey.make} ${cacheKey.baseModel} ` +
            `${cacheKey.manufacturingYear} ${cacheKey.city}), first computed for ${cached.rcNumber}`,
        );
        return {
          source: 'cache',
          cached: true,
          rcNumber: lookup.rcNumber,
          rcDetails: lookup.raw,
          idv: reportFromCache(cached, record, now),
          similarVehicles: await this.similarTo(record, lookup.rcNumber),
        };
      }
    }

    if (!this.deps.priceDiscovery) {
      throw new CredentialError('Price discovery is not configured for the selected AI provider');
    }
    const prices = await this.deps.priceDiscovery.discoverPrices(discoveryRequest(record));

    const idv = computeIdv(
      record,
      { onRoadPrice: prices.onRoadPrice, marketMedianEstimate: prices.marketMedianEstimate },
      now,
    );
    const resale = computeResaleValuation(
      record,
      {
        referencePrice: prices.onRoadPrice,
        referencePriceKind: 'historical',
        marketListingsMean: prices.marketMedianEstimate ?? undefined,
      },
      now,
    );

    const entry: NewCacheRecord = {
      ...cacheKey,
      rcNumber: lookup.rcNumber,
      fullModel: record.fullModel,
      state: record.state ?? null,
      fuelType: record.fuelType,
      vehicleClass: record.vehicleClass,
      ownerCount: record.ownerCount,
      calculatedIdv: idv.calculatedIdv,
      depreciationPercent: idv.depreciationPercent,
      bookValue: resale.metadata.bookValue,
      fairMarketRetailValue: resale.fairMarketRetailValue,
      dealerPurchasePrice: resale.dealerPurchasePrice,
      onRoadPrice: prices.onRoadPrice,
      marketMedianEstimate: prices.marketMedianEstimate,
      variantGuess: prices.variantGuess,
      confidenceHint: prices.confidenceHint,
      validationStatus: idv.validationStatus,
      differencePercent: idv.differencePercent,
      confidenceScore: idv.confidenceScore,
      aiModel: prices.model,
      createdAt: now,
    };
    await this.writeCache(entry);

    console.log(
      `[valuation] ${lookup.rcNumber}: IDV ${idv.calculatedIdv} (${idv.validationStatus}, ` +
        `confidence ${idv.confidenceScore})`,
    );

    return {
      source: 'computed',
      cached: false,
      rcNumber: lookup.rcNumber,
      rcDetails: lookup.raw,
      idv: reportFromCache(entry, record, now),
      similarVehicles: await this.similarTo(record, lookup.rcNumber),
    };
  }

  // ─── Lookup & history ──────────────────────────────────────────────────────

  async lookupRegistration(rcNumber: string): Promise<RegistrationDetails> {
    const lookup = await this.fetchRegistration(rcNumber);
    const { record } = normalizeVehicle(lookup.attributes);
    return { rcNumber: lookup.rcNumber, vehicle: record, rcDetails: lookup.raw };
  }

  async history(rcNumber: string): Promise<CacheRecord[]> {
    return this.deps.store.listByRegistration(normalizeRcNumber(rcNumber));
  }

  async recent(limit: number): Promise<CacheRecord[]> {
    return this.deps.store.listRecent(limit);
  }

  // ─── Collaborators ─────────────────────────────────────────────────────────

  private async fetchRegistration(rcNumber: string): Promise<RcLookupResult> {
    const id = normalizeRcNumber(rcNumber);
    if (!id) throw new ValidationError('rc_number is required');
    if (!this.deps.rcLookup) {
      throw new CredentialError('Registration lookup is not configured (RC_API_TOKEN is unset)');
    }
    return this.deps.rcLookup.fetchByRegistration(id);
  }

  private async readCache(key: CacheKey, now: Date): Promise<CacheRecord | null> {
    try {
      return await this.deps.store.get(key, now);
    } catch (err) {
      console.warn('[idv-cache] lookup failed, treating as a miss:', err instanceof Error ? err.message : err);
      return null;
    }
  }

  private async similarTo(record: VehicleRecord, rcNumber: string): Promise<SimilarVehicle[]> {
    try {
      const rows = await this.deps.store.listSimilar({
        baseModel: record.baseModel,
        manufacturingYear: record.manufacturingYear,
        fuelType: record.fuelType,
        state: record.state ?? null,
        excludeRcNumber: rcNumber,
      });
      return rows.map(toSimilarVehicle);
    } catch (err) {
      console.warn('[idv-cache] similar-vehicle query failed:', err instanceof Error ? err.message : err);
      return [];
    }
  }

  private async writeCache(entry: NewCacheRecord): Promise<void> {
    try {
      await this.deps.store.put(entry);
    } catch (err) {
      console.warn('[idv-cache] write failed, result not cached:', err instanceof Error ? err.message : err);
    }
  }
}

function toSimilarVehicle(row: CacheRecord): SimilarVehicle {
  return {
    rcNumber: row.rcNumber,
    fullModel: row.fullModel,
    manufacturingYear: row.manufacturingYear,
    fuelType: row.fuelType,
    city: row.city,
    state: row.state,
    calculatedIdv: row.calculatedIdv,
    fairMarketRetailValue: row.fairMarketRetailValue,
    dealerPurchasePrice: row.dealerPurchasePrice,
    createdAt: row.createdAt,
  };
}

export function normalizeRcNumber(rcNumber: string): string {
  return rcNumber.replace(/\s+/g, '').toUpperCase();
}
