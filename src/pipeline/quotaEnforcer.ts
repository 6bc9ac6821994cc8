import type { StorageProfileRepository } from '../db/storageProfiles';
import { QuotaExceeded, guardStorage } from '../errors';
import type { StoragePlan, StorageProfile } from '../types';
import type { AuthenticatedContext, QuotaCheckedContext } from './context';
import { admit, reject, type Gate } from './gate';

const GIB = 1024 * 1024 * 1024;

export const PLAN_LIMIT_BYTES: Record<StoragePlan, number> = {
  free: 2 * GIB,
  standard: 10 * GIB,
  premium: 1024 * GIB,
};

export function planLimitBytes(plan: StoragePlan): number {
  return PLAN_LIMIT_BYTES[plan] ?? PLAN_LIMIT_BYTES.free;
}

export function isStorageFull(profile: StorageProfile): boolean {
  return profile.cachedUsageBytes >= planLimitBytes(profile.plan);
}

export function formatBytes(bytes: number): string {
  if (bytes >= 1024 * GIB) return `${(bytes / (1024 * GIB)).toFixed(2)} TB`;
  if (bytes >= GIB) return `${(bytes / GIB).toFixed(2)} GB`;
  if (bytes >= 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
  if (bytes >= 1024) return `${(bytes / 1024).toFixed(2)} KB`;
  return `${bytes} bytes`;
}

export interface StorageSummary {
  owner_id: string;
  plan: StoragePlan;
  usage_bytes: number;
  limit_bytes: number;
  remaining_bytes: number;
  usage_percent: number;
  usage_display: string;
  limit_display: string;
  is_full: boolean;
  usage_calculated_at: string | null;
}

export function summarizeStorage(profile: StorageProfile): StorageSummary {
  const limit = planLimitBytes(profile.plan);
  return {
    owner_id: profile.ownerId,
    plan: profile.plan,
    usage_bytes: profile.cachedUsageBytes,
    limit_bytes: limit,
    remaining_bytes: Math.max(0, limit - profile.cachedUsageBytes),
    usage_percent: Math.min(100, (profile.cachedUsageBytes / limit) * 100),
    usage_display: formatBytes(profile.cachedUsageBytes),
    limit_display: formatBytes(limit),
    is_full: isStorageFull(profile),
    usage_calculated_at: profile.usageCalculatedAt?.toISOString() ?? null,
  };
}

/**
 * Binary quota check against the cached usage figure. The figure is never
 * recomputed here; see workers/storageUsageWorker for the out-of-band refresh.
 */
export class QuotaEnforcer {
  constructor(private readonly profiles: StorageProfileRepository) {}

  readonly gate: Gate<AuthenticatedContext, QuotaCheckedContext> = async (ctx) => {
    const storage = await guardStorage(() => this.profiles.getOrCreate(ctx.device.ownerId));
    if (isStorageFull(storage)) {
      return reject(new QuotaExceeded(storage.cachedUsageBytes, planLimitBytes(storage.plan)));
    }
    return admit({ ...ctx, storage });
  };

  /** Charges an accepted write against the cached figure. */
  charge(ownerId: string, bytes: number): Promise<void> {
    return this.profiles.addUsage(ownerId, bytes);
  }
}
