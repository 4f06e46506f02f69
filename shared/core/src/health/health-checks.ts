/**
 * Standard health checks for the supervised components.
 *
 * Each factory wraps an owner-supplied probe and maps what it observes to a
 * ComponentStatus. The returned function never rejects: probe failures are
 * logged and reported as a status.
 */

import { RESILIENCE_DEFAULTS } from '@tradeguard/config';
import { ComponentStatus, HealthCheckFn } from '@tradeguard/types';
import { Clock, systemClock } from '../async/clock';
import { formatErrorForLog } from '../error-handling';
import { createLogger, ServiceLogger } from '../logging';
import { CircuitBreakerRegistry, CircuitState } from '../resilience/circuit-breaker';

type MaybePromise<T> = T | Promise<T>;

interface CheckDeps {
  logger?: ServiceLogger;
  clock?: Clock;
}

function guarded(name: string, logger: ServiceLogger, check: () => Promise<ComponentStatus>): HealthCheckFn {
  return async () => {
    try {
      return await check();
    } catch (error) {
      logger.error(`Error checking ${name}`, { error: formatErrorForLog(error) });
      return ComponentStatus.FAILED;
    }
  };
}

// =============================================================================
// API client
// =============================================================================

export interface ApiClientProbe {
  /** Cheap round trip (server time). null/undefined means no answer. */
  ping(): MaybePromise<unknown>;
}

/**
 * HEALTHY when the ping answers and no circuit is open, WARNING when some
 * circuit is open, CRITICAL when the ping returns nothing, FAILED when the
 * client is missing or the ping throws.
 */
export function apiClientCheck(
  client: ApiClientProbe | undefined,
  registry?: CircuitBreakerRegistry,
  deps: CheckDeps = {}
): HealthCheckFn {
  const logger = deps.logger ?? createLogger('health-checks');
  return guarded('API client', logger, async () => {
    if (!client) return ComponentStatus.FAILED;

    const answer = await client.ping();
    if (answer === null || answer === undefined) return ComponentStatus.CRITICAL;

    if (registry && registry.getBreakersInState(CircuitState.OPEN).length > 0) {
      return ComponentStatus.WARNING;
    }
    return ComponentStatus.HEALTHY;
  });
}

// =============================================================================
// Market data stream
// =============================================================================

export interface DataStreamProbe {
  /** A disabled stream is not a failure */
  isEnabled(): boolean;
  isHealthy(): MaybePromise<boolean>;
  /** Epoch ms of the last message, null if none yet */
  lastMessageTime(): number | null;
}

export function dataStreamCheck(
  stream: DataStreamProbe | undefined,
  options: { staleAfterMs?: number } = {},
  deps: CheckDeps = {}
): HealthCheckFn {
  const logger = deps.logger ?? createLogger('health-checks');
  const clock = deps.clock ?? systemClock;
  const staleAfterMs = options.staleAfterMs ?? RESILIENCE_DEFAULTS.healthChecks.streamStaleAfterMs;

  return guarded('data stream', logger, async () => {
    if (!stream) return ComponentStatus.FAILED;
    if (!stream.isEnabled()) return ComponentStatus.HEALTHY;
    if (!(await stream.isHealthy())) return ComponentStatus.CRITICAL;

    const last = stream.lastMessageTime();
    if (last !== null && clock.now() - last > staleAfterMs) {
      return ComponentStatus.WARNING;
    }
    return ComponentStatus.HEALTHY;
  });
}

// =============================================================================
// Strategy engine
// =============================================================================

export interface StrategyEngineProbe {
  /** Epoch ms of the last produced signal, null if none yet */
  lastSignalTime(): number | null;
}

export function strategyEngineCheck(
  engine: StrategyEngineProbe | undefined,
  options: { signalTimeoutMs?: number } = {},
  deps: CheckDeps = {}
): HealthCheckFn {
  const logger = deps.logger ?? createLogger('health-checks');
  const clock = deps.clock ?? systemClock;
  const signalTimeoutMs = options.signalTimeoutMs ?? RESILIENCE_DEFAULTS.healthChecks.strategySignalTimeoutMs;

  return guarded('strategy engine', logger, async () => {
    if (!engine) return ComponentStatus.FAILED;

    const last = engine.lastSignalTime();
    if (last !== null && clock.now() - last > signalTimeoutMs) {
      return ComponentStatus.WARNING;
    }
    return ComponentStatus.HEALTHY;
  });
}

// =============================================================================
// Order engine
// =============================================================================

export interface OrderEngineProbe {
  canPlaceOrders?(): MaybePromise<boolean>;
}

export function orderEngineCheck(engine: OrderEngineProbe | undefined, deps: CheckDeps = {}): HealthCheckFn {
  const logger = deps.logger ?? createLogger('health-checks');

  return guarded('order engine', logger, async () => {
    if (!engine) return ComponentStatus.FAILED;
    if (engine.canPlaceOrders && !(await engine.canPlaceOrders())) {
      return ComponentStatus.CRITICAL;
    }
    return ComponentStatus.HEALTHY;
  });
}

// =============================================================================
// Persistence
// =============================================================================

export interface PersistenceProbe {
  ping(): MaybePromise<boolean>;
}

/**
 * Persistence is non-critical: a failing or throwing ping only degrades.
 */
export function persistenceCheck(store: PersistenceProbe | undefined, deps: CheckDeps = {}): HealthCheckFn {
  const logger = deps.logger ?? createLogger('health-checks');

  return async () => {
    if (!store) return ComponentStatus.HEALTHY;
    try {
      return (await store.ping()) ? ComponentStatus.HEALTHY : ComponentStatus.WARNING;
    } catch (error) {
      logger.warn('Persistence ping failed', { error: formatErrorForLog(error) });
      return ComponentStatus.WARNING;
    }
  };
}
