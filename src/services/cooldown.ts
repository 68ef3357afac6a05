import { logger } from '../middleware/logger.js';
import { trackCooldownRejected } from '../middleware/metrics.js';
import type { Janitor, Sweepable } from './janitor.js';

const IDLE_MS = 3600000;

/** Minimum interval between handled messages in one chat. */
export class Cooldown implements Sweepable {
  readonly namespace = 'cooldown';
  private lastTriggerAt = new Map<string, number>();
  private defaultSeconds: number;
  private idleMs: number;
  private janitor?: Janitor;

  constructor(defaultSeconds: number = 3, janitor?: Janitor) {
    this.defaultSeconds = defaultSeconds;
    // Never forget a chat that is still inside its cooldown.
    this.idleMs = Math.max(IDLE_MS, defaultSeconds * 1000);
    this.janitor = janitor;
    janitor?.register(this);
  }

  check(chatId: string | number, cooldownSeconds: number = this.defaultSeconds): boolean {
    const key = String(chatId);
    const now = Date.now();
    const last = this.lastTriggerAt.get(key);
    this.janitor?.tick();

    if (last !== undefined && now - last < cooldownSeconds * 1000) {
      logger.info({ chatId: key }, 'Cooldown active');
      trackCooldownRejected();
      return false;
    }

    this.lastTriggerAt.set(key, now);
    return true;
  }

  get size(): number {
    return this.lastTriggerAt.size;
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [key, last] of this.lastTriggerAt) {
      if (now - last > this.idleMs) {
        this.lastTriggerAt.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.lastTriggerAt.clear();
  }
}
