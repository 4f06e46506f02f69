/**
 * Standard Health Check Unit Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  apiClientCheck,
  CircuitBreakerRegistry,
  dataStreamCheck,
  orderEngineCheck,
  persistenceCheck,
  RecordingLogger,
  strategyEngineCheck,
} from '@tradeguard/core';
import type { DataStreamProbe } from '@tradeguard/core';
import { ComponentStatus } from '@tradeguard/types';
import { ManualClock } from '@tradeguard/test-utils';

const NOW = Date.UTC(2026, 5, 1, 12);

describe('health checks', () => {
  let clock: ManualClock;
  let logger: RecordingLogger;

  beforeEach(() => {
    clock = new ManualClock(NOW);
    logger = new RecordingLogger();
  });

  describe('apiClientCheck', () => {
    it('is HEALTHY when the ping answers', async () => {
      const check = apiClientCheck({ ping: async () => ({ timeSecond: '1780315200' }) }, undefined, { logger });

      await expect(check()).resolves.toBe(ComponentStatus.HEALTHY);
    });

    it('is FAILED without a client', async () => {
      await expect(apiClientCheck(undefined, undefined, { logger })()).resolves.toBe(ComponentStatus.FAILED);
    });

    it('is CRITICAL when the ping returns nothing', async () => {
      const check = apiClientCheck({ ping: () => null }, undefined, { logger });

      await expect(check()).resolves.toBe(ComponentStatus.CRITICAL);
    });

    it('is WARNING while any circuit is open', async () => {
      const registry = new CircuitBreakerRegistry({ errorThreshold: 1 }, { clock, logger });
      registry.getCircuitBreaker('getTickers');
      const check = apiClientCheck({ ping: () => 'pong' }, registry, { logger });

      await expect(check()).resolves.toBe(ComponentStatus.HEALTHY);

      registry.getCircuitBreaker('placeOrder').recordError();

      await expect(check()).resolves.toBe(ComponentStatus.WARNING);
    });

    it('is FAILED and logs when the ping throws', async () => {
      const check = apiClientCheck(
        {
          ping: async () => {
            throw new Error('ECONNREFUSED');
          },
        },
        undefined,
        { logger }
      );

      await expect(check()).resolves.toBe(ComponentStatus.FAILED);
      expect(logger.hasLogMatching('error', 'Error checking API client')).toBe(true);
    });
  });

  describe('dataStreamCheck', () => {
    const stream = (overrides: Partial<DataStreamProbe> = {}): DataStreamProbe => ({
      isEnabled: () => true,
      isHealthy: () => true,
      lastMessageTime: () => NOW - 1000,
      ...overrides,
    });

    it('is HEALTHY for a live stream', async () => {
      await expect(dataStreamCheck(stream(), {}, { logger, clock })()).resolves.toBe(ComponentStatus.HEALTHY);
    });

    it('is HEALTHY when the stream is disabled, whatever its state', async () => {
      const check = dataStreamCheck(stream({ isEnabled: () => false, isHealthy: () => false }), {}, { logger, clock });

      await expect(check()).resolves.toBe(ComponentStatus.HEALTHY);
    });

    it('is CRITICAL when the connection is unhealthy', async () => {
      const check = dataStreamCheck(stream({ isHealthy: async () => false }), {}, { logger, clock });

      await expect(check()).resolves.toBe(ComponentStatus.CRITICAL);
    });

    it('is WARNING once messages are older than the stale threshold', async () => {
      const check = dataStreamCheck(stream({ lastMessageTime: () => NOW }), { staleAfterMs: 5000 }, { logger, clock });

      clock.advance(5000);
      await expect(check()).resolves.toBe(ComponentStatus.HEALTHY);

      clock.advance(1);
      await expect(check()).resolves.toBe(ComponentStatus.WARNING);
    });

    it('uses a 60s default threshold', async () => {
      const check = dataStreamCheck(stream({ lastMessageTime: () => NOW - 60_001 }), {}, { logger, clock });

      await expect(check()).resolves.toBe(ComponentStatus.WARNING);
    });

    it('is HEALTHY before the first message', async () => {
      const check = dataStreamCheck(stream({ lastMessageTime: () => null }), {}, { logger, clock });

      await expect(check()).resolves.toBe(ComponentStatus.HEALTHY);
    });

    it('is FAILED without a stream', async () => {
      await expect(dataStreamCheck(undefined, {}, { logger, clock })()).resolves.toBe(ComponentStatus.FAILED);
    });
  });

  describe('strategyEngineCheck', () => {
    it('is WARNING when no signal was produced within the timeout', async () => {
      const check = strategyEngineCheck({ lastSignalTime: () => NOW - 3_600_001 }, {}, { logger, clock });

      await expect(check()).resolves.toBe(ComponentStatus.WARNING);
    });

    it('is HEALTHY with a recent signal or none yet', async () => {
      const recent = strategyEngineCheck({ lastSignalTime: () => NOW - 3_600_000 }, {}, { logger, clock });
      const none = strategyEngineCheck({ lastSignalTime: () => null }, {}, { logger, clock });

      await expect(recent()).resolves.toBe(ComponentStatus.HEALTHY);
      await expect(none()).resolves.toBe(ComponentStatus.HEALTHY);
    });

    it('honours a custom timeout', async () => {
      const check = strategyEngineCheck({ lastSignalTime: () => NOW - 2000 }, { signalTimeoutMs: 1000 }, { logger, clock });

      await expect(check()).resolves.toBe(ComponentStatus.WARNING);
    });

    it('is FAILED without an engine', async () => {
      await expect(strategyEngineCheck(undefined, {}, { logger, clock })()).resolves.toBe(ComponentStatus.FAILED);
    });
  });

  describe('orderEngineCheck', () => {
    it('is CRITICAL when orders cannot be placed', async () => {
      await expect(orderEngineCheck({ canPlaceOrders: () => false }, { logger })()).resolves.toBe(
        ComponentStatus.CRITICAL
      );
    });

    it('is HEALTHY when orders can be placed or the engine has no such probe', async () => {
      await expect(orderEngineCheck({ canPlaceOrders: async () => true }, { logger })()).resolves.toBe(
        ComponentStatus.HEALTHY
      );
      await expect(orderEngineCheck({}, { logger })()).resolves.toBe(ComponentStatus.HEALTHY);
    });

    it('is FAILED without an engine', async () => {
      await expect(orderEngineCheck(undefined, { logger })()).resolves.toBe(ComponentStatus.FAILED);
    });
  });

  describe('persistenceCheck', () => {
    it('is HEALTHY when no store is configured', async () => {
      await expect(persistenceCheck(undefined, { logger })()).resolves.toBe(ComponentStatus.HEALTHY);
    });

    it('only degrades on a failed or throwing ping', async () => {
      const failing = persistenceCheck({ ping: () => false }, { logger });
      const throwing = persistenceCheck(
        {
          ping: () => {
            throw new Error('database is locked');
          },
        },
        { logger }
      );

      await expect(failing()).resolves.toBe(ComponentStatus.WARNING);
      await expect(throwing()).resolves.toBe(ComponentStatus.WARNING);
      expect(logger.hasLogMatching('warn', 'Persistence ping failed')).toBe(true);
    });
  });
});
