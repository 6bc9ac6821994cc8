// Central export for all workers
export { recomputeOwnerUsage, runStorageUsageWorker } from './storageUsageWorker';
export type { StorageUsageDeps, StorageUsageResult } from './storageUsageWorker';
export { runRateLimitSweeper } from './rateLimitSweeper';
