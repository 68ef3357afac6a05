import { logger } from '../middleware/logger.js';
import { Cooldown } from './cooldown.js';
import { Janitor } from './janitor.js';
import { RateLimiter } from './rate-limiter.js';
import { CommonResponseCache, ResponseCache } from './response-cache.js';

export interface CacheLayerOptions {
  rateLimitMax: number;
  rateLimitWindowMs: number;
  cooldownSeconds: number;
  responseTtlMs: number;
  commonTtlMs: number;
  sweepIntervalMs: number;
}

export const DEFAULT_CACHE_OPTIONS: CacheLayerOptions = {
  rateLimitMax: 10,
  rateLimitWindowMs: 60000,
  cooldownSeconds: 3,
  responseTtlMs: 3600000,
  commonTtlMs: 86400000,
  sweepIntervalMs: 300000,
};

/**
 * Owns every piece of in-memory limiter and cache state for one process.
 * Construct once at startup, pass it to whatever needs it, and `close()` it
 * on shutdown.
 */
export class CacheLayer {
  readonly janitor: Janitor;
  readonly rateLimiter: RateLimiter;
  readonly cooldown: Cooldown;
  readonly responses: ResponseCache;
  readonly common: CommonResponseCache;

  constructor(options: Partial<CacheLayerOptions> = {}) {
    const opts = { ...DEFAULT_CACHE_OPTIONS, ...options };

    this.janitor = new Janitor(opts.sweepIntervalMs);
    this.rateLimiter = new RateLimiter(opts.rateLimitMax, opts.rateLimitWindowMs, this.janitor);
    this.cooldown = new Cooldown(opts.cooldownSeconds, this.janitor);
    this.responses = new ResponseCache(opts.responseTtlMs, this.janitor);
    this.common = new CommonResponseCache(opts.commonTtlMs, this.janitor);

    logger.info(
      { rateLimitMax: opts.rateLimitMax, rateLimitWindowMs: opts.rateLimitWindowMs },
      'In-memory cache layer ready'
    );
  }

  sweep(): Record<string, number> {
    return this.janitor.sweep();
  }

  close(): void {
    this.rateLimiter.clear();
    this.cooldown.clear();
    this.responses.clear();
    this.common.clear();
    logger.info('In-memory cache layer closed');
  }
}
