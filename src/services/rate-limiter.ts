import { logger } from '../middleware/logger.js';
import { trackRateLimitExceeded } from '../middleware/metrics.js';
import type { Janitor, Sweepable } from './janitor.js';

export interface RateLimitStatus {
  requests: number;
  limit: number;
  remaining: number;
  resetTime: number;
}

/**
 * Sliding-window limiter keyed by user. `check` reads and writes a user's
 * window without yielding, so concurrent checks for one user are serialized
 * by the event loop.
 */
export class RateLimiter implements Sweepable {
  readonly namespace = 'rate_limit';
  private windows: Map<string, number[]>;
  private maxCalls: number;
  private windowMs: number;
  private janitor?: Janitor;

  constructor(maxCalls: number = 10, windowMs: number = 60000, janitor?: Janitor) {
    this.windows = new Map();
    this.maxCalls = maxCalls;
    this.windowMs = windowMs;
    this.janitor = janitor;
    janitor?.register(this);
  }

  check(userId: string | number): boolean {
    const key = String(userId);
    const now = Date.now();
    const timestamps = this.prune(key, now);

    if (timestamps.length >= this.maxCalls) {
      logger.warn({ userId: key }, 'Rate limit exceeded');
      trackRateLimitExceeded();
      this.janitor?.tick();
      return false;
    }

    timestamps.push(now);
    this.windows.set(key, timestamps);
    this.janitor?.tick();
    return true;
  }

  status(userId: string | number): RateLimitStatus {
    const now = Date.now();
    const timestamps = this.prune(String(userId), now);
    const oldest = timestamps[0];

    return {
      requests: timestamps.length,
      limit: this.maxCalls,
      remaining: Math.max(this.maxCalls - timestamps.length, 0),
      resetTime: oldest === undefined ? now : oldest + this.windowMs,
    };
  }

  get size(): number {
    return this.windows.size;
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [key, timestamps] of this.windows) {
      const last = timestamps[timestamps.length - 1];
      if (last === undefined || now - last > this.windowMs * 2) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.windows.clear();
  }

  private prune(key: string, now: number): number[] {
    const timestamps = (this.windows.get(key) ?? []).filter(ts => now - ts < this.windowMs);
    if (this.windows.has(key)) {
      this.windows.set(key, timestamps);
    }
    return timestamps;
  }
}
