/**
 * Clock abstraction
 *
 * Components that measure elapsed time or wait take a Clock in their deps.
 * Production uses the monotonic clock for intervals (token refill, circuit
 * timeouts) and the wall clock for operator-facing timestamps; tests inject
 * a manual clock that advances instantly on sleep.
 */

import { performance } from 'perf_hooks';

export interface Clock {
  /** Milliseconds. Only differences between readings are meaningful. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));
}

/** Immune to wall-clock adjustments. */
export const monotonicClock: Clock = {
  now: () => performance.now(),
  sleep,
};

/** Epoch milliseconds; use where readings are shown as dates. */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
