import 'dotenv/config';
import { createServer } from 'http';
import {
  closePool,
  createPool,
  HttpRcLookupAdapter,
  InMemoryValuationCache,
  LlmPriceDiscoveryAdapter,
  PgValuationCacheRepository,
  SystemClock,
} from '@valuation/adapters';
import type { DbPool } from '@valuation/adapters';
import type { ValuationStorePort } from '@valuation/domain';
import { buildApp } from './app.js';
import { aiModelTag, createAiModel } from './config/ai-provider.js';
import { isPriceDiscoveryConfigured, loadConfig } from './config/app-config.js';
import type { AppConfig } from './config/app-config.js';
import { ValuationService } from './services/valuation.service.js';

/**
 * Creates the cache table if needed. Non-fatal: if PostgreSQL is unreachable
 * the cache degrades to misses and every request computes afresh.
 */
async function initStore(config: AppConfig): Promise<{ store: ValuationStorePort; pool: DbPool | null }> {
  if (!config.databaseUrl) {
    console.log('[server] DATABASE_URL not set, using in-memory valuation cache');
    return { store: new InMemoryValuationCache(config.cacheValidityDays), pool: null };
  }
  const pool = createPool(config.databaseUrl);
  const repo = new PgValuationCacheRepository(pool, config.cacheValidityDays);
  try {
    await repo.ensureSchema();
    console.log('[server] database connected');
  } catch (err) {
    console.warn(
      '[server] ⚠ PostgreSQL unavailable on startup, cache reads will miss.',
      err instanceof Error ? err.message : err,
    );
  }
  return { store: repo, pool };
}

async function main() {
  const config = loadConfig();
  const { store, pool } = await initStore(config);

  const rcLookup = config.rcApi.token
    ? new HttpRcLookupAdapter({
        url: config.rcApi.url,
        token: config.rcApi.token,
        timeoutMs: config.rcApi.timeoutMs,
      })
    : null;
  if (!rcLookup) console.warn('[server] RC_API_TOKEN not set, registration routes will answer 401');

  const priceDiscovery = isPriceDiscoveryConfigured(config.ai)
    ? new LlmPriceDiscoveryAdapter(createAiModel(config.ai), aiModelTag(config.ai))
    : null;
  if (!priceDiscovery) {
    console.warn(`[server] no API key for AI provider "${config.ai.provider}", price discovery disabled`);
  }

  const service = new ValuationService({ store, rcLookup, priceDiscovery, clock: new SystemClock() });
  const app = buildApp({ service, corsOrigin: config.corsOrigin });
  const httpServer = createServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    if (pool) await closePool(pool);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
