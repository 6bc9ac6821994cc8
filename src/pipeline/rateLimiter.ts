import type { CounterStore } from '../db/rateLimitCounters';
import { RateLimitExceeded, guardStorage } from '../errors';
import type { AuthenticatedContext } from './context';
import { admit, reject, type Gate } from './gate';

export interface RateLimitConfig {
  capacity: number; // admitted requests per window
  windowMs: number;
  /** Keeps limiters that share a counter store apart. Defaults to `ingest`. */
  prefix?: string;
}

export interface RateLimitResult {
  allowed: boolean;
  count: number;
  remaining: number;
  resetAt: number;
  retryAfterSeconds: number;
}

/**
 * Fixed-window limiter keyed by device serial. Ingest and credential
 * rotation each get their own instance, told apart by key prefix.
 *
 * Windows are aligned to multiples of `windowMs`, so a device can be admitted
 * up to `capacity` times just before a boundary and `capacity` times just
 * after it: close to 2× capacity across the boundary. That is the accepted
 * cost of fixed windows here.
 */
export class RateLimiter {
  constructor(
    private readonly counters: CounterStore,
    private readonly config: RateLimitConfig,
    private readonly clock: () => Date = () => new Date()
  ) {}

  bucketKey(serial: string, at: Date): string {
    return `${this.config.prefix ?? 'ingest'}:${serial}:${Math.floor(at.getTime() / this.config.windowMs)}`;
  }

  async consume(serial: string): Promise<RateLimitResult> {
    const now = this.clock();
    const windowIndex = Math.floor(now.getTime() / this.config.windowMs);
    const resetAt = (windowIndex + 1) * this.config.windowMs;

    const count = await this.counters.increment(this.bucketKey(serial, now), resetAt - now.getTime(), now);

    return {
      allowed: count <= this.config.capacity,
      count,
      remaining: Math.max(0, this.config.capacity - count),
      resetAt,
      retryAfterSeconds: Math.max(1, Math.ceil((resetAt - now.getTime()) / 1000)),
    };
  }

  readonly gate: Gate<AuthenticatedContext> = async (ctx) => {
    const result = await guardStorage(() => this.consume(ctx.device.serial));
    if (!result.allowed) return reject(new RateLimitExceeded(result.retryAfterSeconds));
    return admit(ctx);
  };

  sweep(): Promise<number> {
    return this.counters.sweep(this.clock());
  }
}
