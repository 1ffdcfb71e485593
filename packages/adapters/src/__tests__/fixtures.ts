import type { NewCacheRecord } from '@valuation/domain';

export function makeCacheRecord(overrides: Partial<NewCacheRecord> = {}): NewCacheRecord {
  return {
    rcNumber: 'DL08AB1234',
    make: 'HONDA',
    baseModel: 'ACTIVA',
    fullModel: 'ACTIVA 5G',
    state: 'DELHI',
    manufacturingYear: '2017',
    city: 'DELHI',
    fuelType: 'Petrol',
    vehicleClass: '2W',
    ownerCount: 1,
    calculatedIdv: 23_100,
    depreciationPercent: 65,
    bookValue: 39_600,
    fairMarketRetailValue: 32_000,
    dealerPurchasePrice: 20_800,
    onRoadPrice: 66_000,
    marketMedianEstimate: 24_000,
    variantGuess: 'STD',
    confidenceHint: 70,
    validationStatus: 'Within Acceptable Range',
    differencePercent: 3.75,
    confidenceScore: 85,
    aiModel: 'test-model',
    createdAt: new Date('2024-09-15T10:00:00.000Z'),
    ...overrides,
  };
}
