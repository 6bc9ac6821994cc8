import type { RateLimiter } from '../pipeline/rateLimiter';
import { createLogger } from '../utils/logger';

const log = createLogger('rate-limit-sweeper');

/** Drops counters whose window has closed. */
export async function runRateLimitSweeper(limiter: RateLimiter) {
  const removed = await limiter.sweep();
  if (removed > 0) log.debug({ removed }, 'Expired rate-limit counters removed');
  return { success: true, items_processed: removed };
}
