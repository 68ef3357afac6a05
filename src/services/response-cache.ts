import { createHash } from 'node:crypto';
import { logger } from '../middleware/logger.js';
import { trackCacheHit, trackCacheMiss } from '../middleware/metrics.js';
import type { Janitor, Sweepable } from './janitor.js';

interface CacheEntry {
  value: string;
  expiresAt: number;
}

export function normalizeMessage(rawMessage: string): string {
  return rawMessage.toLowerCase().trim();
}

export function messageDigest(rawMessage: string): string {
  return createHash('md5').update(normalizeMessage(rawMessage)).digest('hex').slice(0, 16);
}

/**
 * String cache with a fixed TTL per entry. Expired entries are dropped when
 * read, or by the janitor.
 */
export class TtlCache implements Sweepable {
  readonly namespace: string;
  private entries: Map<string, CacheEntry>;
  private ttlMs: number;
  private janitor?: Janitor;

  constructor(namespace: string, ttlMs: number, janitor?: Janitor) {
    this.namespace = namespace;
    this.entries = new Map();
    this.ttlMs = ttlMs;
    this.janitor = janitor;
    janitor?.register(this);
  }

  protected read(key: string): string | undefined {
    this.janitor?.tick();
    const entry = this.entries.get(key);

    if (entry && Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
    } else if (entry) {
      logger.debug({ key }, 'Cache hit');
      trackCacheHit(this.namespace);
      return entry.value;
    }

    trackCacheMiss(this.namespace);
    return undefined;
  }

  protected write(key: string, value: string): void {
    this.janitor?.tick();
    this.entries.set(key, { value, expiresAt: Date.now() + this.ttlMs });
    logger.debug({ key }, 'Cache set');
  }

  get size(): number {
    return this.entries.size;
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }
}

/** Replies scoped to the chat they were produced in. */
export class ResponseCache extends TtlCache {
  constructor(ttlMs: number = 3600000, janitor?: Janitor) {
    super('response', ttlMs, janitor);
  }

  static key(chatId: string | number, rawMessage: string): string {
    return `response:${chatId}:${messageDigest(rawMessage)}`;
  }

  get(chatId: string | number, rawMessage: string): string | undefined {
    return this.read(ResponseCache.key(chatId, rawMessage));
  }

  put(chatId: string | number, rawMessage: string, value: string): void {
    this.write(ResponseCache.key(chatId, rawMessage), value);
  }
}

/** Chat-independent replies to small talk. */
export class CommonResponseCache extends TtlCache {
  constructor(ttlMs: number = 86400000, janitor?: Janitor) {
    super('common', ttlMs, janitor);
  }

  static key(rawMessage: string): string {
    return `common:${messageDigest(rawMessage)}`;
  }

  get(rawMessage: string): string | undefined {
    return this.read(CommonResponseCache.key(rawMessage));
  }

  put(rawMessage: string, value: string): void {
    this.write(CommonResponseCache.key(rawMessage), value);
  }
}
