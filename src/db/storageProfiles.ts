import { Pool } from 'pg';
import type { StoragePlan, StorageProfile } from '../types';

export interface StorageProfileRepository {
  /** Reads the cached profile, creating a free-plan one on first use. */
  getOrCreate(ownerId: string): Promise<StorageProfile>;
  addUsage(ownerId: string, bytes: number): Promise<void>;
  saveUsage(ownerId: string, bytes: number, calculatedAt: Date): Promise<StorageProfile>;
  setPlan(ownerId: string, plan: StoragePlan): Promise<StorageProfile>;
  /** Owners whose usage was never computed or was last computed before `olderThan`. */
  listStale(olderThan: Date): Promise<string[]>;
}

interface ProfileRow {
  owner_id: string;
  plan: StoragePlan;
  cached_usage_bytes: string;
  usage_calculated_at: Date | null;
}

const PROFILE_COLUMNS = 'owner_id, plan, cached_usage_bytes, usage_calculated_at';

function mapProfile(row: ProfileRow): StorageProfile {
  return {
    ownerId: row.owner_id,
    plan: row.plan,
    // BIGINT arrives as a string from pg
    cachedUsageBytes: Number(row.cached_usage_bytes),
    usageCalculatedAt: row.usage_calculated_at,
  };
}

export class PgStorageProfileRepository implements StorageProfileRepository {
  constructor(private readonly pool: Pool) {}

  // Plain read on the hot path; the insert only runs for an owner seen for the first time.
  async getOrCreate(ownerId: string): Promise<StorageProfile> {
    const existing = await this.find(ownerId);
    if (existing) return existing;

    await this.pool.query(
      'INSERT INTO storage_profiles (owner_id) VALUES ($1) ON CONFLICT (owner_id) DO NOTHING',
      [ownerId]
    );
    const created = await this.find(ownerId);
    if (!created) throw new Error(`Storage profile for ${ownerId} missing after insert`);
    return created;
  }

  private async find(ownerId: string): Promise<StorageProfile | null> {
    const { rows } = await this.pool.query<ProfileRow>(
      `SELECT ${PROFILE_COLUMNS} FROM storage_profiles WHERE owner_id = $1`,
      [ownerId]
    );
    return rows[0] ? mapProfile(rows[0]) : null;
  }

  async addUsage(ownerId: string, bytes: number): Promise<void> {
    await this.pool.query(
      `UPDATE storage_profiles
       SET cached_usage_bytes = cached_usage_bytes + $2, updated_at = NOW()
       WHERE owner_id = $1`,
      [ownerId, bytes]
    );
  }

  async saveUsage(ownerId: string, bytes: number, calculatedAt: Date): Promise<StorageProfile> {
    const { rows } = await this.pool.query<ProfileRow>(
      `INSERT INTO storage_profiles (owner_id, cached_usage_bytes, usage_calculated_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (owner_id) DO UPDATE
       SET cached_usage_bytes = EXCLUDED.cached_usage_bytes,
           usage_calculated_at = EXCLUDED.usage_calculated_at,
           updated_at = NOW()
       RETURNING ${PROFILE_COLUMNS}`,
      [ownerId, bytes, calculatedAt]
    );
    return mapProfile(rows[0]);
  }

  async setPlan(ownerId: string, plan: StoragePlan): Promise<StorageProfile> {
    const { rows } = await this.pool.query<ProfileRow>(
      `INSERT INTO storage_profiles (owner_id, plan) VALUES ($1, $2)
       ON CONFLICT (owner_id) DO UPDATE SET plan = EXCLUDED.plan, updated_at = NOW()
       RETURNING ${PROFILE_COLUMNS}`,
      [ownerId, plan]
    );
    return mapProfile(rows[0]);
  }

  async listStale(olderThan: Date): Promise<string[]> {
    const { rows } = await this.pool.query<{ owner_id: string }>(
      `SELECT owner_id FROM storage_profiles
       WHERE usage_calculated_at IS NULL OR usage_calculated_at < $1
       ORDER BY usage_calculated_at NULLS FIRST`,
      [olderThan]
    );
    return rows.map((r) => r.owner_id);
  }
}
