import { logger } from '../middleware/logger.js';
import { trackEvictions } from '../middleware/metrics.js';

export interface Sweepable {
  readonly namespace: string;
  /** Remove stale entries and return how many were dropped. */
  sweep(now: number): number;
}

/**
 * Opportunistic cleanup shared by the in-memory stores. Stores call `tick()`
 * on every access; a full pass runs at most once per interval.
 */
export class Janitor {
  private readonly targets: Sweepable[] = [];
  private readonly intervalMs: number;
  private lastSweep: number;

  constructor(intervalMs: number = 300000) {
    this.intervalMs = intervalMs;
    this.lastSweep = Date.now();
  }

  register(target: Sweepable): void {
    this.targets.push(target);
  }

  tick(): void {
    const now = Date.now();
    if (now - this.lastSweep < this.intervalMs) return;
    this.sweep(now);
  }

  sweep(now: number = Date.now()): Record<string, number> {
    this.lastSweep = now;

    const removed: Record<string, number> = {};
    let total = 0;
    for (const target of this.targets) {
      const count = target.sweep(now);
      removed[target.namespace] = count;
      total += count;
      trackEvictions(target.namespace, count);
    }

    if (total > 0) {
      logger.info({ removed }, 'Cache cleanup');
    }
    return removed;
  }
}
