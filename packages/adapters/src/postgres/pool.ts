import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

/** What the repositories need from a pool; tests pass an in-memory fake */
export interface Queryable {
  query(sql: string, params?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

let _pool: pg.Pool | null = null;

export function getPool(connectionString?: string): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString: connectionString ?? process.env['DATABASE_URL'],
      max: 4,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'vehicle-dashboard',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}
