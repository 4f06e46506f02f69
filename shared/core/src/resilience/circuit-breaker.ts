// Circuit breaker for exchange operations
//
// One breaker per operation name (e.g. `placeOrder`, `getPositions`). Callers
// ask allowRequest() before the call and report recordSuccess()/recordError()
// after it. All methods are synchronous, so every transition is atomic on the
// event loop.

import { RESILIENCE_DEFAULTS } from '@tradeguard/config';
import { Clock, monotonicClock } from '../async/clock';
import { CircuitOpenError, ConfigurationError } from '../error-handling';
import { createLogger, ServiceLogger } from '../logging';

// =============================================================================
// Dependency Injection Interfaces
// =============================================================================

export interface CircuitBreakerDeps {
  logger?: ServiceLogger;
  clock?: Clock;
}

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export interface CircuitBreakerConfig {
  /** Errors (each within errorTimeoutMs of the previous) before opening */
  errorThreshold: number;
  /** Gap after which accumulated errors are forgiven */
  errorTimeoutMs: number;
  /** Time spent OPEN before a probe is admitted */
  circuitTimeoutMs: number;
  /** Admit only one probe while HALF_OPEN */
  singleProbe: boolean;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  errorCount: number;
  errorThreshold: number;
  /** Clock reading of the last counted error, null if none */
  lastErrorTime: number | null;
  /** Clock reading of the last OPEN transition, null if never opened */
  openTime: number | null;
  probeInFlight: boolean;
  totalErrors: number;
  totalSuccesses: number;
  rejectedRequests: number;
}

function validateConfig(name: string, config: CircuitBreakerConfig): void {
  if (!Number.isInteger(config.errorThreshold) || config.errorThreshold < 1) {
    throw new ConfigurationError(`errorThreshold for circuit "${name}" must be an integer >= 1`, {
      field: 'errorThreshold',
    });
  }
  for (const field of ['errorTimeoutMs', 'circuitTimeoutMs'] as const) {
    const value = config[field];
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigurationError(`${field} for circuit "${name}" must be >= 0, got ${value}`, { field });
    }
  }
}

export class CircuitBreaker {
  readonly name: string;
  private readonly config: CircuitBreakerConfig;
  private state: CircuitState = CircuitState.CLOSED;
  private errorCount = 0;
  private lastErrorTime: number | null = null;
  private openTime: number | null = null;
  private probeStartedAt: number | null = null;
  private totalErrors = 0;
  private totalSuccesses = 0;
  private rejectedRequests = 0;
  private readonly logger: ServiceLogger;
  private readonly clock: Clock;

  constructor(
    name: string,
    config: Partial<CircuitBreakerConfig> = {},
    deps: CircuitBreakerDeps = {}
  ) {
    this.name = name;
    this.config = { ...RESILIENCE_DEFAULTS.circuitBreaker, ...config };
    validateConfig(name, this.config);
    this.logger = deps.logger ?? createLogger('circuit-breaker');
    this.clock = deps.clock ?? monotonicClock;
  }

  /**
   * Admission check. In OPEN, the first caller after the circuit timeout
   * moves the breaker to HALF_OPEN and becomes the probe.
   */
  allowRequest(): boolean {
    const now = this.clock.now();

    switch (this.state) {
      case CircuitState.CLOSED:
        return true;

      case CircuitState.OPEN:
        if (this.openTime !== null && now - this.openTime > this.config.circuitTimeoutMs) {
          this.state = CircuitState.HALF_OPEN;
          this.probeStartedAt = now;
          this.logger.info('Circuit breaker transitioning to HALF_OPEN', {
            name: this.name,
            circuitTimeoutMs: this.config.circuitTimeoutMs,
          });
          return true;
        }
        this.rejectedRequests++;
        return false;

      case CircuitState.HALF_OPEN:
        if (!this.config.singleProbe) {
          return true;
        }
        // A probe that never reported back re-arms after circuitTimeoutMs
        if (this.probeStartedAt !== null && now - this.probeStartedAt <= this.config.circuitTimeoutMs) {
          this.rejectedRequests++;
          return false;
        }
        this.logger.warn('Circuit breaker probe went stale, admitting a new probe', { name: this.name });
        this.probeStartedAt = now;
        return true;
    }
  }

  recordSuccess(): void {
    this.totalSuccesses++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.state = CircuitState.CLOSED;
      this.errorCount = 0;
      this.probeStartedAt = null;
      this.logger.info('Circuit breaker transitioned to CLOSED', { name: this.name });
    }
  }

  recordError(): void {
    this.totalErrors++;
    const now = this.clock.now();

    if (this.state === CircuitState.HALF_OPEN) {
      this.open(now);
      this.logger.warn('Circuit breaker back to OPEN after failed probe', {
        name: this.name,
        circuitTimeoutMs: this.config.circuitTimeoutMs,
      });
      return;
    }

    if (this.state === CircuitState.OPEN) {
      return;
    }

    if (this.lastErrorTime !== null && now - this.lastErrorTime > this.config.errorTimeoutMs) {
      this.errorCount = 0;
    }
    this.errorCount++;
    this.lastErrorTime = now;

    if (this.errorCount >= this.config.errorThreshold) {
      this.open(now);
      this.logger.warn('Circuit breaker opened due to errors', {
        name: this.name,
        errorThreshold: this.config.errorThreshold,
        circuitTimeoutMs: this.config.circuitTimeoutMs,
      });
    }
  }

  /**
   * Run `operation` under this breaker.
   *
   * @throws CircuitOpenError without invoking `operation` when refused
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (!this.allowRequest()) {
      throw new CircuitOpenError(this.name);
    }
    try {
      const result = await operation();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordError();
      throw error;
    }
  }

  /**
   * Force CLOSED with all counters zeroed.
   */
  reset(): void {
    const previousState = this.state;
    this.state = CircuitState.CLOSED;
    this.errorCount = 0;
    this.lastErrorTime = null;
    this.openTime = null;
    this.probeStartedAt = null;
    this.totalErrors = 0;
    this.totalSuccesses = 0;
    this.rejectedRequests = 0;

    this.logger.info('Circuit breaker reset', { name: this.name, previousState });
  }

  getState(): CircuitState {
    return this.state;
  }

  getConfig(): Readonly<CircuitBreakerConfig> {
    return { ...this.config };
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.name,
      state: this.state,
      errorCount: this.errorCount,
      errorThreshold: this.config.errorThreshold,
      lastErrorTime: this.lastErrorTime,
      openTime: this.openTime,
      probeInFlight: this.state === CircuitState.HALF_OPEN && this.probeStartedAt !== null,
      totalErrors: this.totalErrors,
      totalSuccesses: this.totalSuccesses,
      rejectedRequests: this.rejectedRequests,
    };
  }

  private open(now: number): void {
    this.state = CircuitState.OPEN;
    this.openTime = now;
    this.errorCount = 0;
    this.probeStartedAt = null;
  }
}

// =============================================================================
// Registry
// =============================================================================

/**
 * Breakers keyed by operation name, created lazily with registry defaults.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly defaults: CircuitBreakerConfig;

  constructor(
    defaults: Partial<CircuitBreakerConfig> = {},
    private readonly deps: CircuitBreakerDeps = {}
  ) {
    this.defaults = { ...RESILIENCE_DEFAULTS.circuitBreaker, ...defaults };
    validateConfig('registry defaults', this.defaults);
  }

  /**
   * Get or create the breaker for `name`. `overrides` only apply when the
   * breaker is created; an existing instance is returned unchanged.
   */
  getCircuitBreaker(name: string, overrides: Partial<CircuitBreakerConfig> = {}): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) {
      return existing;
    }
    const breaker = new CircuitBreaker(name, { ...this.defaults, ...overrides }, this.deps);
    this.breakers.set(name, breaker);
    return breaker;
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  getAllStates(): Record<string, CircuitState> {
    const states: Record<string, CircuitState> = {};
    for (const [name, breaker] of this.breakers) {
      states[name] = breaker.getState();
    }
    return states;
  }

  getAllStats(): Record<string, CircuitBreakerStats> {
    const stats: Record<string, CircuitBreakerStats> = {};
    for (const [name, breaker] of this.breakers) {
      stats[name] = breaker.getStats();
    }
    return stats;
  }

  /** Names of breakers currently in `state`. */
  getBreakersInState(state: CircuitState): string[] {
    return [...this.breakers.values()].filter(b => b.getState() === state).map(b => b.name);
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }
}
