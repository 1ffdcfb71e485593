import { v4 as uuidv4 } from 'uuid';
import { CACHE_VALIDITY_DAYS, normalizeCacheKey, SIMILAR_VEHICLES_LIMIT } from '@valuation/domain';
import type {
  CacheKey,
  CacheRecord,
  NewCacheRecord,
  SimilarVehicleQuery,
  ValuationStorePort,
} from '@valuation/domain';

const DAY_MS = 86_400_000;
const DEFAULT_HISTORY_LIMIT = 20;

/** Process-local store used when no DATABASE_URL is configured, and in tests. */
export class InMemoryValuationCache implements ValuationStorePort {
  private readonly records: CacheRecord[] = [];

  constructor(private readonly validityDays: number = CACHE_VALIDITY_DAYS) {}

  async get(key: CacheKey, asOf: Date): Promise<CacheRecord | null> {
    const k = normalizeCacheKey(key);
    const notBefore = asOf.getTime() - this.validityDays * DAY_MS;
    const matches = this.records.filter(
      (r) =>
        r.make === k.make &&
        r.baseModel === k.baseModel &&
        r.manufacturingYear === k.manufacturingYear &&
        r.city === k.city &&
        r.createdAt.getTime() >= notBefore,
    );
    return newestFirst(matches)[0] ?? null;
  }

  async put(record: NewCacheRecord): Promise<CacheRecord> {
    const stored: CacheRecord = {
      ...record,
      ...normalizeCacheKey(record),
      state: record.state?.toUpperCase() ?? null,
      id: uuidv4(),
    };
    this.records.push(stored);
    return stored;
  }

  async listByRegistration(rcNumber: string, limit = DEFAULT_HISTORY_LIMIT): Promise<CacheRecord[]> {
    const rc = rcNumber.toUpperCase();
    return newestFirst(this.records.filter((r) => r.rcNumber === rc)).slice(0, limit);
  }

  async listRecent(limit = DEFAULT_HISTORY_LIMIT): Promise<CacheRecord[]> {
    return newestFirst(this.records).slice(0, limit);
  }

  async listSimilar(query: SimilarVehicleQuery, limit = SIMILAR_VEHICLES_LIMIT): Promise<CacheRecord[]> {
    const baseModel = query.baseModel.toUpperCase();
    const state = query.state?.toUpperCase() ?? null;
    const exclude = query.excludeRcNumber?.toUpperCase();
    const matches = this.records.filter(
      (r) =>
        r.baseModel === baseModel &&
        r.manufacturingYear === query.manufacturingYear &&
        r.fuelType === query.fuelType &&
        (state === null || r.state === state) &&
        r.rcNumber !== exclude,
    );
    return newestFirst(matches).slice(0, limit);
  }

  get size(): number {
    return this.records.length;
  }
}

// Later inserts win ties on createdAt.
function newestFirst(records: CacheRecord[]): CacheRecord[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => b.record.createdAt.getTime() - a.record.createdAt.getTime() || b.index - a.index)
    .map(({ record }) => record);
}
