import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { DeterministicClock, InMemoryValuationCache } from '@valuation/adapters';
import { CollaboratorError, CredentialError, ValidationError } from '@valuation/domain';
import type { ManualValuationCommand, ValuationStorePort } from '@valuation/domain';
import { ValuationService } from '../services/valuation.service.js';
import {
  ACTIVA_RC,
  ACTIVA_SECOND_RC,
  NOW,
  StubRcLookup,
  stubPriceDiscovery,
} from './fakes.js';

const SWIFT: ManualValuationCommand = {
  vehicle: {
    make: 'Maruti Suzuki',
    model: 'Swift VXi',
    manufacturingDate: '2019-03',
    fuelType: 'Petrol',
    registrationCode: 'DL3C',
    registeredAt: 'Delhi',
    bodyType: 'Hatchback',
    color: 'White',
  },
  currentExShowroom: 650_000,
};

describe('ValuationService', () => {
  let clock: DeterministicClock;
  let store: InMemoryValuationCache;
  let rcLookup: StubRcLookup;
  let priceDiscovery: ReturnType<typeof stubPriceDiscovery>;
  let service: ValuationService;

  beforeEach(() => {
    clock = new DeterministicClock(NOW);
    store = new InMemoryValuationCache();
    rcLookup = new StubRcLookup({ DL08AB1234: ACTIVA_RC, DL09CD5678: ACTIVA_SECOND_RC });
    priceDiscovery = stubPriceDiscovery();
    service = new ValuationService({ store, rcLookup, priceDiscovery, clock });
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('resale', () => {
    it('values a manual entry from a current ex-showroom price', () => {
      const { vehicle, valuation } = service.valueManual(SWIFT);
      expect(vehicle.make).toBe('MARUTI SUZUKI');
      expect(vehicle.fullModel).toBe('SWIFT VXI');
      expect(valuation.metadata.historicalReferencePrice).toBe(542_750);
      expect(valuation.fairMarketRetailValue).toBeCloseTo(272_569.05, 1);
    });

    it('passes lifecycle overrides through', () => {
      const { valuation } = service.valueManual({ ...SWIFT, newGenerationLaunched: false });
      expect(valuation.metadata.appliedRules).toEqual([]);
      expect(valuation.metadata.adjustedBookValue).toBe(325_650);
    });

    it('rejects a non-positive price', () => {
      expect(() => service.valueManual({ ...SWIFT, currentExShowroom: 0 })).toThrow(ValidationError);
    });

    it('reports batch failures per item', () => {
      const results = service.valueBatch([
        SWIFT,
        { ...SWIFT, vehicle: { ...SWIFT.vehicle, manufacturingDate: 'sometime' } },
      ]);
      expect(results[0]?.success).toBe(true);
      expect(results[1]).toEqual({
        index: 1,
        success: false,
        error: 'Unparseable manufacturing date: "sometime"',
      });
    });

    it('values a registration with the looked-up record', async () => {
      const outcome = await service.valueFromRegistration({
        rcNumber: 'dl08 ab1234',
        currentExShowroom: 80_000,
      });
      expect(rcLookup.calls).toEqual(['DL08AB1234']);
      expect(outcome.rcNumber).toBe('DL08AB1234');
      expect(outcome.vehicle.vehicleClass).toBe('2W');
      expect(outcome.rcDetails).toEqual({ rc_number: 'DL08AB1234', source: 'stub' });
    });
  });

  describe('IDV with caller prices', () => {
    it('computes a scooter IDV seven years and a month after manufacture', async () => {
      const outcome = await service.idvFromRegistration({
        rcNumber: 'DL08AB1234',
        onRoadPrice: 66_000,
        marketMedianEstimate: 42_000,
      });
      expect(outcome.valuation.depreciationPercent).toBe(65);
      expect(outcome.valuation.calculatedIdv).toBe(23_100);
      expect(outcome.valuation.validationStatus).toBe('Manual Review Required');
      expect(outcome.valuation.confidenceScore).toBe(65);
    });

    it('surfaces a failed lookup as a collaborator error', async () => {
      await expect(
        service.idvFromRegistration({ rcNumber: 'KA01XX0000', onRoadPrice: 66_000 }),
      ).rejects.toBeInstanceOf(CollaboratorError);
    });

    it('needs a registration number', async () => {
      await expect(service.lookupRegistration('   ')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('IDV with price discovery', () => {
    it('computes on a miss and stores the result', async () => {
      const outcome = await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' });

      expect(outcome.source).toBe('computed');
      expect(outcome.cached).toBe(false);
      expect(outcome.idv).toMatchObject({
        vehicleMake: 'HONDA',
        vehicleModel: 'ACTIVA',
        calculatedIdv: 23_100,
        depreciationPercent: 65,
        marketMedianEstimate: 42_000,
        validationStatus: 'Manual Review Required',
        confidenceScore: 65,
        confidenceHint: 70,
        variant: 'STD',
        aiModel: 'stub:model',
        vehicleAgeMonths: 85,
        estimatedOdometer: 85_000,
      });
      expect(priceDiscovery.discoverPrices).toHaveBeenCalledTimes(1);
      expect(priceDiscovery.discoverPrices.mock.calls[0]?.[0]).toMatchObject({
        make: 'HONDA',
        baseModel: 'ACTIVA',
        manufacturingYear: '2017',
        city: 'DELHI',
        vehicleClass: '2W',
      });
      expect(store.size).toBe(1);
    });

    it('serves a second registration with the same key from cache, with its own age', async () => {
      const first = await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' });
      clock.advanceDays(10);
      const second = await service.idvWithPriceDiscovery({ rcNumber: 'DL09CD5678' });

      expect(priceDiscovery.discoverPrices).toHaveBeenCalledTimes(1);
      expect(second.source).toBe('cache');
      expect(second.cached).toBe(true);
      expect(second.rcNumber).toBe('DL09CD5678');
      expect(second.idv.calculatedIdv).toBe(first.idv.calculatedIdv);
      expect(second.idv.fairMarketRetailValue).toBe(first.idv.fairMarketRetailValue);
      expect(second.idv.ownerCount).toBe(2);
      // 2017-11 → 2024-09-25: 82 months
      expect(second.idv.vehicleAgeMonths).toBe(82);
      expect(second.idv.vehicleAge).toBe('6 years 10 months');
      expect(second.idv.estimatedOdometer).toBe(82_000);
      expect(second.idv.computedAt).toEqual(NOW);
      expect(store.size).toBe(1);
    });

    it('lists other stored registrations of the same model, year and fuel in the state', async () => {
      const first = await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' });
      expect(first.similarVehicles).toEqual([]);

      const second = await service.idvWithPriceDiscovery({ rcNumber: 'DL09CD5678' });
      expect(second.similarVehicles).toEqual([
        {
          rcNumber: 'DL08AB1234',
          fullModel: 'ACTIVA 5G',
          manufacturingYear: '2017',
          fuelType: 'Petrol',
          city: 'DELHI',
          state: 'DELHI',
          calculatedIdv: 23_100,
          fairMarketRetailValue: first.idv.fairMarketRetailValue,
          dealerPurchasePrice: first.idv.dealerPurchasePrice,
          createdAt: NOW,
        },
      ]);
    });

    it('recomputes once the cached entry is older than 90 days', async () => {
      await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' });

      clock.advanceDays(90);
      expect((await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' })).source).toBe('cache');

      clock.advance(1);
      const expired = await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' });
      expect(expired.source).toBe('computed');
      expect(priceDiscovery.discoverPrices).toHaveBeenCalledTimes(2);
      expect(store.size).toBe(2);
    });

    it('bypasses the cache on request and still writes', async () => {
      await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' });
      const fresh = await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234', skipCache: true });

      expect(fresh.source).toBe('computed');
      expect(priceDiscovery.discoverPrices).toHaveBeenCalledTimes(2);
      expect(store.size).toBe(2);
    });

    it('treats a failing cache as a miss', async () => {
      const broken: ValuationStorePort = {
        get: async () => {
          throw new Error('connection refused');
        },
        put: async () => {
          throw new Error('connection refused');
        },
        listByRegistration: async () => [],
        listRecent: async () => [],
        listSimilar: async () => {
          throw new Error('connection refused');
        },
      };
      const degraded = new ValuationService({ store: broken, rcLookup, priceDiscovery, clock });

      const outcome = await degraded.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' });
      expect(outcome.source).toBe('computed');
      expect(outcome.idv.calculatedIdv).toBe(23_100);
      expect(outcome.similarVehicles).toEqual([]);
    });

    it('answers from cache even without a price-discovery credential', async () => {
      await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' });
      const keyless = new ValuationService({ store, rcLookup, priceDiscovery: null, clock });

      expect((await keyless.idvWithPriceDiscovery({ rcNumber: 'DL09CD5678' })).source).toBe('cache');
      await expect(
        keyless.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234', skipCache: true }),
      ).rejects.toBeInstanceOf(CredentialError);
    });

    it('requires a lookup credential', async () => {
      const noLookup = new ValuationService({ store, rcLookup: null, priceDiscovery, clock });
      await expect(noLookup.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' })).rejects.toBeInstanceOf(
        CredentialError,
      );
    });
  });

  describe('history', () => {
    it('lists stored valuations by registration and by recency', async () => {
      await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234' });
      clock.advanceDays(1);
      await service.idvWithPriceDiscovery({ rcNumber: 'DL08AB1234', skipCache: true });

      expect(await service.history('dl08ab1234')).toHaveLength(2);
      expect(await service.history('DL09CD5678')).toEqual([]);
      const recent = await service.recent(1);
      expect(recent).toHaveLength(1);
      expect(recent[0]?.createdAt).toEqual(new Date(NOW.getTime() + 86_400_000));
    });
  });
});
