// src/cron.ts
import cron, { type ScheduledTask } from 'node-cron';
import { Pool } from 'pg';
import { cfg } from './config';
import type { RateLimiter } from './pipeline/rateLimiter';
import { runWorker } from './utils/runWorker';
import { createLogger } from './utils/logger';
import { errorMessage } from './errors';
import { runRateLimitSweeper, runStorageUsageWorker, type StorageUsageDeps } from './workers';

const log = createLogger('cron');

export interface CronDeps extends StorageUsageDeps {
  pool: Pool;
  rateLimiter: RateLimiter;
}

/** `*\/N * * * *` for N minutes, falling back to hourly once N no longer divides into an hour. */
export function everyMinutes(minutes: number): string {
  const n = Math.max(1, Math.trunc(minutes));
  return n >= 60 ? '0 * * * *' : `*/${n} * * * *`;
}

function schedule(expression: string, name: string, job: () => Promise<void>): ScheduledTask {
  return cron.schedule(expression, () => {
    job().catch((err: unknown) => log.error({ job: name, err: errorMessage(err) }, 'Cron job failed'));
  });
}

export function startCronJobs(deps: CronDeps): ScheduledTask[] {
  log.info('Starting cron jobs');

  const tasks = [
    // Keeps cached storage usage within the staleness bound
    schedule(everyMinutes(cfg.STORAGE_USAGE_MAX_STALENESS_MINUTES), 'storageUsage', () =>
      runWorker(deps.pool, 'storageUsage', () =>
        runStorageUsageWorker(deps, cfg.STORAGE_USAGE_MAX_STALENESS_MINUTES)
      )
    ),
    schedule('*/5 * * * *', 'rateLimitSweeper', () =>
      runWorker(deps.pool, 'rateLimitSweeper', () => runRateLimitSweeper(deps.rateLimiter))
    ),
  ];

  log.info({ jobs: tasks.length }, 'Cron jobs scheduled');
  return tasks;
}
