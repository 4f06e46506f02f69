/**
 * Manual Clock
 *
 * Deterministic Clock for timing tests. sleep() advances time instantly and
 * records the requested duration, so a blocking token bucket or a retry
 * backoff completes without real waiting.
 *
 * ```typescript
 * const clock = new ManualClock();
 * const bucket = new TokenBucket({ maxTokens: 5, refillRate: 5 }, { clock });
 * await bucket.consume(5);
 * await bucket.consume(5);
 * expect(clock.sleeps).toEqual([1000]);
 * ```
 */

import type { Clock } from '@tradeguard/core';

export class ManualClock implements Clock {
  private current: number;
  /** Every duration passed to sleep(), in call order */
  readonly sleeps: number[] = [];

  constructor(startMs = 0) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
