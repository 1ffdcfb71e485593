import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  CACHE_VALIDITY_DAYS,
  FUEL_TYPES,
  normalizeCacheKey,
  SIMILAR_VEHICLES_LIMIT,
  VALIDATION_STATUSES,
  VEHICLE_CLASSES,
} from '@valuation/domain';
import type {
  CacheKey,
  CacheRecord,
  NewCacheRecord,
  SimilarVehicleQuery,
  ValuationStorePort,
} from '@valuation/domain';
import type { Queryable } from './pool.js';

const DAY_MS = 86_400_000;
const DEFAULT_HISTORY_LIMIT = 20;

export const IDV_CACHE_DDL = `
CREATE SCHEMA IF NOT EXISTS valuation;

CREATE TABLE IF NOT EXISTS valuation.idv_cache (
  id                     UUID PRIMARY KEY,
  rc_number              TEXT NOT NULL,
  make                   TEXT NOT NULL,
  base_model             TEXT NOT NULL,
  full_model             TEXT NOT NULL,
  state                  TEXT,
  manufacturing_year     TEXT NOT NULL,
  city                   TEXT NOT NULL,
  fuel_type              TEXT NOT NULL,
  vehicle_class          TEXT NOT NULL,
  owner_count            INTEGER NOT NULL,
  calculated_idv         NUMERIC(14,2) NOT NULL,
  depreciation_percent   NUMERIC(6,2) NOT NULL,
  book_value             NUMERIC(14,2) NOT NULL,
  fair_market_retail     NUMERIC(14,2) NOT NULL,
  dealer_purchase_price  NUMERIC(14,2) NOT NULL,
  on_road_price          NUMERIC(14,2) NOT NULL,
  market_median_estimate NUMERIC(14,2),
  variant_guess          TEXT,
  confidence_hint        NUMERIC(6,2),
  validation_status      TEXT NOT NULL,
  difference_percent     NUMERIC(8,2),
  confidence_score       NUMERIC(6,2) NOT NULL,
  ai_model               TEXT,
  created_at             TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idv_cache_key_idx
  ON valuation.idv_cache (make, base_model, manufacturing_year, city, created_at DESC);
CREATE INDEX IF NOT EXISTS idv_cache_rc_idx
  ON valuation.idv_cache (rc_number, created_at DESC);
CREATE INDEX IF NOT EXISTS idv_cache_similar_idx
  ON valuation.idv_cache (base_model, manufacturing_year, fuel_type, state, created_at DESC);
`;

// NUMERIC columns arrive as strings from pg
const numeric = z.union([z.number(), z.string()]).pipe(z.coerce.number());
const nullableNumeric = numeric.nullable();

const cacheRowSchema = z.object({
  id: z.string(),
  rc_number: z.string(),
  make: z.string(),
  base_model: z.string(),
  full_model: z.string(),
  state: z.string().nullable(),
  manufacturing_year: z.string(),
  city: z.string(),
  fuel_type: z.enum(FUEL_TYPES),
  vehicle_class: z.enum(VEHICLE_CLASSES),
  owner_count: numeric,
  calculated_idv: numeric,
  depreciation_percent: numeric,
  book_value: numeric,
  fair_market_retail: numeric,
  dealer_purchase_price: numeric,
  on_road_price: numeric,
  market_median_estimate: nullableNumeric,
  variant_guess: z.string().nullable(),
  confidence_hint: nullableNumeric,
  validation_status: z.enum(VALIDATION_STATUSES),
  difference_percent: nullableNumeric,
  confidence_score: numeric,
  ai_model: z.string().nullable(),
  created_at: z.coerce.date(),
});

export function mapCacheRow(row: unknown): CacheRecord {
  const r = cacheRowSchema.parse(row);
  return {
    id: r.id,
    rcNumber: r.rc_number,
    make: r.make,
    baseModel: r.base_model,
    fullModel: r.full_model,
    state: r.state,
    manufacturingYear: r.manufacturing_year,
    city: r.city,
    fuelType: r.fuel_type,
    vehicleClass: r.vehicle_class,
    ownerCount: r.owner_count,
    calculatedIdv: r.calculated_idv,
    depreciationPercent: r.depreciation_percent,
    bookValue: r.book_value,
    fairMarketRetailValue: r.fair_market_retail,
    dealerPurchasePrice: r.dealer_purchase_price,
    onRoadPrice: r.on_road_price,
    marketMedianEstimate: r.market_median_estimate,
    variantGuess: r.variant_guess,
    confidenceHint: r.confidence_hint,
    validationStatus: r.validation_status,
    differencePercent: r.difference_percent,
    confidenceScore: r.confidence_score,
    aiModel: r.ai_model,
    createdAt: r.created_at,
  };
}

export class PgValuationCacheRepository implements ValuationStorePort {
  constructor(
    private readonly db: Queryable,
    private readonly validityDays: number = CACHE_VALIDITY_DAYS,
  ) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(IDV_CACHE_DDL);
  }

  async get(key: CacheKey, asOf: Date): Promise<CacheRecord | null> {
    const k = normalizeCacheKey(key);
    const notBefore = new Date(asOf.getTime() - this.validityDays * DAY_MS);
    const { rows } = await this.db.query(
      `SELECT * FROM valuation.idv_cache
       WHERE make = $1
         AND base_model = $2
         AND manufacturing_year = $3
         AND city = $4
         AND created_at >= $5
       ORDER BY created_at DESC
       LIMIT 1`,
      [k.make, k.baseModel, k.manufacturingYear, k.city, notBefore],
    );
    return rows[0] ? mapCacheRow(rows[0]) : null;
  }

  async put(record: NewCacheRecord): Promise<CacheRecord> {
    const k = normalizeCacheKey(record);
    const { rows } = await this.db.query(
      `INSERT INTO valuation.idv_cache
         (id, rc_number, make, base_model, full_model, state, manufacturing_year, city,
          fuel_type, vehicle_class, owner_count, calculated_idv, depreciation_percent,
          book_value, fair_market_retail, dealer_purchase_price, on_road_price,
          market_median_estimate, variant_guess, confidence_hint, validation_status,
          difference_percent, confidence_score, ai_model, created_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,$19,$20,$21,$22,$23,$24,$25)
       RETURNING *`,
      [
        uuidv4(),
        record.rcNumber,
        k.make,
        k.baseModel,
        record.fullModel,
        record.state?.toUpperCase() ?? null,
        k.manufacturingYear,
        k.city,
        record.fuelType,
        record.vehicleClass,
        record.ownerCount,
        record.calculatedIdv,
        record.depreciationPercent,
        record.bookValue,
        record.fairMarketRetailValue,
        record.dealerPurchasePrice,
        record.onRoadPrice,
        record.marketMedianEstimate,
        record.variantGuess,
        record.confidenceHint,
        record.validationStatus,
        record.differencePercent,
        record.confidenceScore,
        record.aiModel,
        record.createdAt,
      ],
    );
    if (!rows[0]) throw new Error('Insert into valuation.idv_cache returned no row');
    return mapCacheRow(rows[0]);
  }

  async listByRegistration(rcNumber: string, limit = DEFAULT_HISTORY_LIMIT): Promise<CacheRecord[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM valuation.idv_cache
       WHERE rc_number = $1
       ORDER BY created_at DESC
       LIMIT $2`,
      [rcNumber.toUpperCase(), limit],
    );
    return rows.map(mapCacheRow);
  }

  async listRecent(limit = DEFAULT_HISTORY_LIMIT): Promise<CacheRecord[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM valuation.idv_cache ORDER BY created_at DESC LIMIT $1`,
      [limit],
    );
    return rows.map(mapCacheRow);
  }

  async listSimilar(query: SimilarVehicleQuery, limit = SIMILAR_VEHICLES_LIMIT): Promise<CacheRecord[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM valuation.idv_cache
       WHERE base_model = $1
         AND manufacturing_year = $2
         AND fuel_type = $3
         AND ($4::text IS NULL OR state = $4)
         AND rc_number <> $5
       ORDER BY created_at DESC
       LIMIT $6`,
      [
        query.baseModel.toUpperCase(),
        query.manufacturingYear,
        query.fuelType,
        query.state?.toUpperCase() ?? null,
        query.excludeRcNumber?.toUpperCase() ?? '',
        limit,
      ],
    );
    return rows.map(mapCacheRow);
  }
}
