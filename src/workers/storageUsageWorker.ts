import type { StorageProfileRepository } from '../db/storageProfiles';
import type { TelemetryStore } from '../db/telemetry';
import { errorMessage } from '../errors';
import type { StorageProfile } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('storage-usage');

export interface StorageUsageDeps {
  store: TelemetryStore;
  profiles: StorageProfileRepository;
}

export interface StorageUsageResult {
  success: boolean;
  items_processed: number;
  failed: number;
}

/** Replaces an owner's cached usage with a fresh estimate from stored samples. */
export async function recomputeOwnerUsage(
  deps: StorageUsageDeps,
  ownerId: string,
  now: Date = new Date()
): Promise<StorageProfile> {
  const bytes = await deps.store.estimateUsageByOwner(ownerId);
  return deps.profiles.saveUsage(ownerId, bytes, now);
}

/**
 * Refreshes every owner whose cached figure is older than half of
 * `maxStalenessMinutes`. The job runs once per bound, so a tick that starts a
 * little earlier past the minute than the last one still refreshes what the
 * last one wrote. One owner failing does not stop the others.
 */
export async function runStorageUsageWorker(
  deps: StorageUsageDeps,
  maxStalenessMinutes: number,
  now: Date = new Date()
): Promise<StorageUsageResult> {
  const olderThan = new Date(now.getTime() - (maxStalenessMinutes * 60_000) / 2);
  const owners = await deps.profiles.listStale(olderThan);

  let processed = 0;
  let failed = 0;
  for (const ownerId of owners) {
    try {
      const profile = await recomputeOwnerUsage(deps, ownerId, now);
      processed++;
      log.debug({ ownerId, bytes: profile.cachedUsageBytes }, 'Usage recomputed');
    } catch (err) {
      failed++;
      log.error({ ownerId, err: errorMessage(err) }, 'Usage recompute failed');
    }
  }

  log.info({ stale: owners.length, processed, failed }, 'Storage usage refresh done');
  return { success: failed === 0, items_processed: processed, failed };
}
