import { describe, it, expect } from '@jest/globals';
import { computeIdv } from '../idv-pipeline.js';
import { AS_OF, makeRecord } from './fixtures.js';

const activa = makeRecord({
  make: 'HONDA',
  baseModel: 'ACTIVA',
  fullModel: 'ACTIVA 5G',
  manufacturingYear: '2017',
  manufacturingMonth: 8,
  vehicleClass: '2W',
  color: 'Grey',
});

describe('computeIdv', () => {
  it('routes a scooter far from its market median to manual review', () => {
    const result = computeIdv(activa, { onRoadPrice: 66_000, marketMedianEstimate: 42_000 }, AS_OF);
    expect(result).toMatchObject({
      calculatedIdv: 23_100,
      depreciationPercent: 65,
      marketMedianEstimate: 42_000,
      differencePercent: 45,
      validationStatus: 'Manual Review Required',
      confidenceScore: 65,
    });
    expect(result.metadata).toMatchObject({
      vehicleAge: '7 years 1 months',
      vehicleAgeMonths: 85,
      estimatedOdometer: 85_000,
      vehicleClass: '2W',
      accessoryDepreciationPercent: null,
      ownerFactor: 1,
      appliedRules: [],
    });
  });

  it('accepts an IDV near the median', () => {
    const result = computeIdv(activa, { onRoadPrice: 66_000, marketMedianEstimate: 24_000 }, AS_OF);
    expect(result.validationStatus).toBe('Within Acceptable Range');
    expect(result.differencePercent).toBe(3.75);
    expect(result.confidenceScore).toBe(85);
  });

  it('reports no market data without a median', () => {
    const result = computeIdv(activa, { onRoadPrice: 66_000 }, AS_OF);
    expect(result.marketMedianEstimate).toBeNull();
    expect(result.differencePercent).toBeNull();
    expect(result.validationStatus).toBe('No Market Data');
    expect(result.confidenceScore).toBe(75);
  });

  it('splits an electric car into body and accessories', () => {
    const ev = makeRecord({ fuelType: 'Electric', manufacturingYear: '2021', manufacturingMonth: 9 });
    const result = computeIdv(ev, { onRoadPrice: 1_000_000 }, AS_OF);
    expect(result.depreciationPercent).toBe(40);
    expect(result.calculatedIdv).toBe(585_000);
    expect(result.metadata.accessoryDepreciationPercent).toBe(50);
  });

  it('applies the owner penalty after depreciation', () => {
    const used = makeRecord({ ownerCount: 3, manufacturingYear: '2023', manufacturingMonth: 9 });
    const result = computeIdv(used, { onRoadPrice: 500_000 }, AS_OF);
    expect(result.depreciationPercent).toBe(20);
    expect(result.calculatedIdv).toBe(368_000);
    expect(result.metadata.appliedRules.map((r) => r.id)).toEqual(['third-owner']);
  });

  it('caps the owner penalty at twelve percent', () => {
    const used = makeRecord({ ownerCount: 6, manufacturingYear: '2023', manufacturingMonth: 9 });
    const result = computeIdv(used, { onRoadPrice: 500_000 }, AS_OF);
    // 500,000 × 0.80 × 0.88
    expect(result.calculatedIdv).toBe(352_000);
    expect(result.metadata.ownerFactor).toBeCloseTo(0.88, 10);
    expect(result.metadata.appliedRules.map((r) => r.id)).toEqual(['fourth-owner-or-more']);
  });

  it('never reverse-inflates the on-road price', () => {
    const result = computeIdv(activa, { onRoadPrice: 66_000 }, AS_OF);
    expect(result.metadata.onRoadPrice).toBe(66_000);
  });
});
