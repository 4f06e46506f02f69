/**
 * Test Utilities for the resilience control plane
 *
 * ```typescript
 * import { ManualClock, StubExchangeTransport, RecordingNotifier } from '@tradeguard/test-utils';
 * ```
 */

export { ManualClock } from './helpers/manual-clock';
export { StubExchangeTransport } from './mocks/exchange-transport.mock';
export type { RecordedCall } from './mocks/exchange-transport.mock';
export { RecordingNotifier, InMemoryMetricsSink } from './mocks/collaborators.mock';
export { setupTestEnv, restoreEnv, withEnv } from './setup/env-setup';

/**
 * Let pending promise callbacks and setImmediate handoffs run.
 */
export async function flushAsync(rounds = 3): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}
