/**
 * Port Interface Contract Tests
 *
 * Ports have no runtime artifact, so each test builds a minimal implementation
 * that must satisfy the interface. A compilation failure here means the port
 * shape changed.
 */

import { describe, it, expect, jest } from '@jest/globals';

import type {
  CacheKey,
  CacheRecord,
  ClockPort,
  NewCacheRecord,
  PriceDiscoveryPort,
  RcLookupPort,
  ValuationStorePort,
} from '../index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Outbound Ports
// ═══════════════════════════════════════════════════════════════════════════════

describe('ClockPort', () => {
  it('returns the current instant', () => {
    const at = new Date('2024-09-15T10:00:00Z');
    const clock: ClockPort = { now: () => at };
    expect(clock.now()).toBe(at);
  });
});

describe('RcLookupPort', () => {
  it('resolves attributes and the raw payload', async () => {
    const lookup: RcLookupPort = {
      fetchByRegistration: jest.fn<RcLookupPort['fetchByRegistration']>().mockResolvedValue({
        rcNumber: 'DL08AB1234',
        attributes: { make: 'HONDA', model: 'ACTIVA 5G', manufacturingDate: '2017-08' },
        raw: { rc_number: 'DL08AB1234' },
      }),
    };

    const result = await lookup.fetchByRegistration('DL08AB1234');
    expect(result.attributes.model).toBe('ACTIVA 5G');
    expect(result.raw).toEqual({ rc_number: 'DL08AB1234' });
  });
});

describe('PriceDiscoveryPort', () => {
  it('may leave the market median unknown', async () => {
    const discovery: PriceDiscoveryPort = {
      discoverPrices: jest.fn<PriceDiscoveryPort['discoverPrices']>().mockResolvedValue({
        onRoadPrice: 66_000,
        marketMedianEstimate: null,
        variantGuess: null,
        confidenceHint: null,
        model: 'test:model',
      }),
    };

    const result = await discovery.discoverPrices({
      make: 'HONDA',
      baseModel: 'ACTIVA',
      fullModel: 'ACTIVA 5G',
      fuelType: 'Petrol',
      manufacturingYear: '2017',
      city: 'DELHI',
      vehicleClass: '2W',
    });
    expect(result.marketMedianEstimate).toBeNull();
  });
});

describe('ValuationStorePort', () => {
  it('is implementable as an insert-only list', async () => {
    const rows: CacheRecord[] = [];
    const matches = (r: CacheKey, k: CacheKey) =>
      r.make === k.make && r.baseModel === k.baseModel && r.manufacturingYear === k.manufacturingYear && r.city === k.city;

    const cache: ValuationStorePort = {
      get: async (key) => rows.filter((r) => matches(r, key)).at(-1) ?? null,
      put: async (record: NewCacheRecord) => {
        const row = { ...record, id: `row-${rows.length + 1}` };
        rows.push(row);
        return row;
      },
      listByRegistration: async (rcNumber) => rows.filter((r) => r.rcNumber === rcNumber),
      listRecent: async (limit = 20) => rows.slice(-limit).reverse(),
      listSimilar: async (query, limit = 5) =>
        rows
          .filter((r) => r.baseModel === query.baseModel && r.rcNumber !== query.excludeRcNumber)
          .slice(-limit)
          .reverse(),
    };

    const key = { make: 'HONDA', baseModel: 'ACTIVA', manufacturingYear: '2017', city: 'DELHI' };
    expect(await cache.get(key, new Date())).toBeNull();

    const stored = await cache.put({
      rcNumber: 'DL08AB1234',
      ...key,
      fullModel: 'ACTIVA 5G',
      state: 'DELHI',
      fuelType: 'Petrol',
      vehicleClass: '2W',
      ownerCount: 1,
      calculatedIdv: 23_100,
      depreciationPercent: 65,
      bookValue: 26_400,
      fairMarketRetailValue: 24_552,
      dealerPurchasePrice: 21_000,
      onRoadPrice: 66_000,
      marketMedianEstimate: 42_000,
      variantGuess: 'STD',
      confidenceHint: 70,
      validationStatus: 'Manual Review Required',
      differencePercent: 45,
      confidenceScore: 65,
      aiModel: 'test:model',
      createdAt: new Date('2024-09-15T10:00:00Z'),
    });
    expect(stored.id).toBe('row-1');
    expect(await cache.get(key, new Date())).toBe(stored);
    expect(await cache.listByRegistration('DL08AB1234')).toEqual([stored]);
    expect(
      await cache.listSimilar({
        baseModel: 'ACTIVA',
        manufacturingYear: '2017',
        fuelType: 'Petrol',
        state: 'DELHI',
        excludeRcNumber: 'DL08AB1234',
      }),
    ).toEqual([]);
  });
});
