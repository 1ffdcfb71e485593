import type {
  CacheKey,
  CacheRecord,
  NewCacheRecord,
  SimilarVehicleQuery,
} from '../../entities/cache-record.js';

export interface ValuationCachePort {
  /**
   * Most recent record whose key matches exactly (case-insensitive) and whose
   * `createdAt` falls inside the validity window ending at `asOf`.
   */
  get(key: CacheKey, asOf: Date): Promise<CacheRecord | null>;
  /** Insert-only. Existing rows for the same key are left untouched. */
  put(record: NewCacheRecord): Promise<CacheRecord>;
}

export interface ValuationHistoryPort {
  listByRegistration(rcNumber: string, limit?: number): Promise<CacheRecord[]>;
  listRecent(limit?: number): Promise<CacheRecord[]>;
  /** Newest first, across the whole history (no validity window). */
  listSimilar(query: SimilarVehicleQuery, limit?: number): Promise<CacheRecord[]>;
}

export type ValuationStorePort = ValuationCachePort & ValuationHistoryPort;
