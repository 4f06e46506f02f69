/**
 * Async primitives: mutual exclusion, injectable time, polling loops.
 */

export { AsyncMutex } from './async-mutex';
export type { MutexStats } from './async-mutex';

export { monotonicClock, systemClock, sleep } from './clock';
export type { Clock } from './clock';

export { PollingLoop } from './polling-loop';
export type { PollingLoopStats } from './polling-loop';
