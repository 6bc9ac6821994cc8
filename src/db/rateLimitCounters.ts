import { Pool } from 'pg';

/**
 * Time-bucketed counters. A bucket key carries its window index, so counts
 * reset by the key rolling over; expired buckets are only garbage.
 */
export interface CounterStore {
  /** Atomically adds one to `key` and returns the new count. */
  increment(key: string, ttlMs: number, now: Date): Promise<number>;
  /** Drops buckets that expired before `now`; returns how many were removed. */
  sweep(now: Date): Promise<number>;
}

interface CounterEntry {
  count: number;
  expiresAt: number;
}

// Single-process store: the read-increment-write below never yields to the
// event loop, so two requests for the same key cannot interleave.
export class MemoryCounterStore implements CounterStore {
  private readonly entries = new Map<string, CounterEntry>();

  async increment(key: string, ttlMs: number, now: Date): Promise<number> {
    const at = now.getTime();
    const entry = this.entries.get(key);

    if (!entry || entry.expiresAt <= at) {
      this.entries.set(key, { count: 1, expiresAt: at + ttlMs });
      return 1;
    }

    entry.count++;
    return entry.count;
  }

  async sweep(now: Date): Promise<number> {
    const at = now.getTime();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= at) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

export class PgCounterStore implements CounterStore {
  constructor(private readonly pool: Pool) {}

  async increment(key: string, ttlMs: number, now: Date): Promise<number> {
    const expiresAt = new Date(now.getTime() + ttlMs);
    const { rows } = await this.pool.query<{ count: number }>(
      `INSERT INTO rate_limit_counters (bucket_key, count, expires_at)
       VALUES ($1, 1, $2)
       ON CONFLICT (bucket_key) DO UPDATE
       SET count = rate_limit_counters.count + 1
       RETURNING count`,
      [key, expiresAt]
    );
    return rows[0].count;
  }

  async sweep(now: Date): Promise<number> {
    const { rowCount } = await this.pool.query(
      'DELETE FROM rate_limit_counters WHERE expires_at <= $1',
      [now]
    );
    return rowCount ?? 0;
  }
}
