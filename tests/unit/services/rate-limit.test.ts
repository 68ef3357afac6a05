import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RateLimiter } from '../../../src/services/rate-limiter.js';

const START = new Date('2026-01-01T00:00:00.000Z');

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('allows ten calls per window and rejects the eleventh', () => {
    const limiter = new RateLimiter(10, 60000);

    for (let i = 0; i < 10; i++) {
      expect(limiter.check('user-1')).toBe(true);
    }
    expect(limiter.check('user-1')).toBe(false);
  });

  it('allows calls again once the window has elapsed', () => {
    const limiter = new RateLimiter(10, 60000);
    for (let i = 0; i < 10; i++) limiter.check('user-1');

    vi.advanceTimersByTime(59999);
    expect(limiter.check('user-1')).toBe(false);

    vi.advanceTimersByTime(1);
    expect(limiter.check('user-1')).toBe(true);
  });

  it('slides rather than resetting in fixed buckets', () => {
    const limiter = new RateLimiter(2, 60000);

    expect(limiter.check('user-1')).toBe(true);
    vi.advanceTimersByTime(30000);
    expect(limiter.check('user-1')).toBe(true);
    vi.advanceTimersByTime(30000);
    // the first call has left the window, the second has not
    expect(limiter.check('user-1')).toBe(true);
    expect(limiter.check('user-1')).toBe(false);
  });

  it('tracks different users separately', () => {
    const limiter = new RateLimiter(1, 60000);

    expect(limiter.check('user-1')).toBe(true);
    expect(limiter.check('user-1')).toBe(false);
    expect(limiter.check('user-2')).toBe(true);
  });

  it('does not count rejected calls', () => {
    const limiter = new RateLimiter(1, 60000);

    limiter.check(42);
    vi.advanceTimersByTime(30000);
    expect(limiter.check(42)).toBe(false);
    vi.advanceTimersByTime(30000);
    expect(limiter.check(42)).toBe(true);
  });

  it('never lets concurrent checks for one user exceed the limit', async () => {
    const limiter = new RateLimiter(10, 60000);

    const results = await Promise.all(
      Array.from({ length: 25 }, async () => limiter.check('user-1'))
    );

    expect(results.filter(Boolean)).toHaveLength(10);
  });

  it('reports status for a user', () => {
    const limiter = new RateLimiter(10, 60000);
    limiter.check('user-1');
    vi.advanceTimersByTime(5000);
    limiter.check('user-1');

    expect(limiter.status('user-1')).toEqual({
      requests: 2,
      limit: 10,
      remaining: 8,
      resetTime: START.getTime() + 60000,
    });
  });

  it('sweeps users idle for more than two windows', () => {
    const limiter = new RateLimiter(10, 60000);
    limiter.check('idle');
    vi.advanceTimersByTime(100000);
    limiter.check('active');

    expect(limiter.sweep(START.getTime() + 120001)).toBe(1);
    expect(limiter.size).toBe(1);
    expect(limiter.status('active').requests).toBe(1);
  });
});
