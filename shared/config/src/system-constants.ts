/**
 * Resilience Defaults
 *
 * Centralized defaults for rate limiting, circuit breaking, failover
 * supervision and metrics collection. Every value here can be overridden
 * through `loadResilienceConfig()`.
 */

/**
 * Bucket definition: `maxTokens` calls allowed per `intervalMs`.
 * The bucket refills continuously at `maxTokens / intervalSeconds` tokens/s.
 */
export interface RateLimitDefinition {
  maxTokens: number;
  intervalMs: number;
}

// =============================================================================
// RESILIENCE DEFAULTS
// =============================================================================
export const RESILIENCE_DEFAULTS = {
  // Per call-class budgets, matched to the exchange's documented REST limits
  rateLimits: {
    default: { maxTokens: 100, intervalMs: 10_000 },
    order: { maxTokens: 50, intervalMs: 10_000 },
    position: { maxTokens: 50, intervalMs: 10_000 },
    market: { maxTokens: 120, intervalMs: 10_000 },
    account: { maxTokens: 60, intervalMs: 10_000 },
  } satisfies Record<string, RateLimitDefinition>,

  circuitBreaker: {
    /** Errors (within the error timeout window) before the circuit opens */
    errorThreshold: 5,
    /** Idle time after which the error count is forgiven */
    errorTimeoutMs: 60_000,
    /** Time the circuit stays OPEN before admitting a probe */
    circuitTimeoutMs: 300_000,
    /** Admit a single probe in HALF_OPEN */
    singleProbe: true,
  },

  failover: {
    enabled: true,
    autoRecovery: true,
    maxRecoveryAttempts: 3,
    /** Fixed (non-exponential) wait between recovery attempts of one component */
    recoveryBackoffMs: 60_000,
    emergencyShutdown: true,
    notificationEnabled: true,
    checkIntervalMs: 30_000,
    /** Bounded wait for the in-flight iteration on stop() */
    stopTimeoutMs: 1_000,
  },

  retry: {
    maxAttempts: 3,
    initialDelayMs: 5_000,
    maxDelayMs: 60_000,
    backoffMultiplier: 2,
  },

  metrics: {
    enabled: true,
    collectionIntervalMs: 10_000,
    maxPoints: 10_000,
    retentionMs: 7 * 24 * 60 * 60 * 1000,
  },

  healthChecks: {
    /** Data stream is WARNING when no message arrived for this long */
    streamStaleAfterMs: 60_000,
    /** Strategy engine is WARNING when no signal was produced for this long */
    strategySignalTimeoutMs: 60 * 60 * 1000,
  },
};

export type ResilienceDefaults = typeof RESILIENCE_DEFAULTS;
