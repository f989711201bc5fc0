import type { Reading, ReadingArchivePort } from '@vehicle-dash/domain';
import { closePool, getPool } from './pool.js';
import type { Queryable } from './pool.js';

const COLS_PER_ROW = 4;

/** Appends accepted readings to `dashboard.readings` (see db/schema.sql). */
export class PgReadingArchiveRepository implements ReadingArchivePort {
  private readonly db: Queryable;

  constructor(db?: Queryable) {
    this.db = db ?? getPool();
  }

  async append(runId: string, readings: readonly Reading[]): Promise<void> {
    if (readings.length === 0) return;
    const values: unknown[] = [];
    const placeholders = readings.map((r, i) => {
      const base = i * COLS_PER_ROW;
      values.push(runId, r.metric, r.value, r.ts);
      const cols = Array.from({ length: COLS_PER_ROW }, (_, k) => `$${base + k + 1}`);
      return `(${cols.join(',')})`;
    });
    await this.db.query(
      `INSERT INTO dashboard.readings (run_id, metric, value, ts)
       VALUES ${placeholders.join(',')}`,
      values,
    );
  }

  async close(): Promise<void> {
    await closePool();
  }
}

