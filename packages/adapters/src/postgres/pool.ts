import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

/** The part of a pool or client the repositories use. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export function createPool(databaseUrl: string): pg.Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: 'vehicle-valuation-api',
  });
  pool.on('error', (err) => {
    console.error('[pg-pool] unexpected error on idle client', err);
  });
  return pool;
}

export async function closePool(pool: pg.Pool): Promise<void> {
  await pool.end();
}
