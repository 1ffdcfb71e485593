// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { createPool, closePool } from './postgres/pool.js';
export type { DbPool, Queryable } from './postgres/pool.js';
export {
  PgValuationCacheRepository,
  IDV_CACHE_DDL,
  mapCacheRow,
} from './postgres/valuation-cache.repository.js';

// ─── In-Memory Adapters ───────────────────────────────────────────────────────
export { InMemoryValuationCache } from './memory/in-memory-valuation-cache.js';

// ─── HTTP Adapters ────────────────────────────────────────────────────────────
export { HttpRcLookupAdapter, parseRcRecord, toRawAttributes } from './http/rc-lookup.adapter.js';
export type { RcLookupOptions } from './http/rc-lookup.adapter.js';

// ─── LLM Adapters ─────────────────────────────────────────────────────────────
export {
  LlmPriceDiscoveryAdapter,
  describeVehicle,
  stripCodeFence,
} from './llm/llm-price-discovery.adapter.js';
export type { ChatModelLike } from './llm/llm-price-discovery.adapter.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { DeterministicClock, SystemClock } from './clock/deterministic-clock.js';
