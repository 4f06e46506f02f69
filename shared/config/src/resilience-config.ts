/**
 * Resilience Config Loader
 *
 * Merges environment overrides over RESILIENCE_DEFAULTS and validates the
 * result with zod. Operators give durations in seconds; everything past this
 * boundary is milliseconds.
 *
 * Environment variables:
 * - RATE_LIMIT_<KEY>=<maxTokens>/<intervalSeconds>  (e.g. RATE_LIMIT_ORDER=50/10)
 * - CB_ERROR_THRESHOLD, CB_ERROR_TIMEOUT_SEC, CB_CIRCUIT_TIMEOUT_SEC, CB_SINGLE_PROBE
 * - FAILOVER_ENABLED, FAILOVER_AUTO_RECOVERY, FAILOVER_MAX_RECOVERY_ATTEMPTS,
 *   FAILOVER_RECOVERY_BACKOFF_SEC, FAILOVER_EMERGENCY_SHUTDOWN,
 *   FAILOVER_NOTIFICATIONS, FAILOVER_CHECK_INTERVAL_SEC
 * - RETRY_MAX_ATTEMPTS, RETRY_INITIAL_DELAY_SEC, RETRY_MAX_DELAY_SEC, RETRY_BACKOFF_MULTIPLIER
 * - METRICS_ENABLED, METRICS_INTERVAL_SEC, METRICS_MAX_POINTS, METRICS_RETENTION_DAYS
 */

import { RESILIENCE_DEFAULTS, RateLimitDefinition } from './system-constants';
import { ResilienceConfig, ResilienceConfigSchema, validateOrThrow } from './schemas';
import {
  parseBoolean,
  parseRateLimitSpec,
  parseSecondsToMs,
  safeParseFloat,
  safeParseInt,
} from './utils/env-parsing';

type Env = Record<string, string | undefined>;

const RATE_LIMIT_PREFIX = 'RATE_LIMIT_';
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Collect RATE_LIMIT_* overrides. Malformed values keep the default for that
 * key (unknown keys with malformed values are ignored).
 */
function loadRateLimits(env: Env): Record<string, RateLimitDefinition> {
  const limits: Record<string, RateLimitDefinition> = { ...RESILIENCE_DEFAULTS.rateLimits };

  for (const [name, raw] of Object.entries(env)) {
    if (!name.startsWith(RATE_LIMIT_PREFIX)) continue;
    const key = name.slice(RATE_LIMIT_PREFIX.length).toLowerCase().replace(/_/g, '-');
    const parsed = parseRateLimitSpec(raw);
    if (parsed && key) {
      limits[key] = parsed;
    }
  }

  return limits;
}

/**
 * Build the full resilience configuration from environment variables.
 *
 * @param env - Variable source, defaults to process.env
 * @param overrides - Programmatic overrides applied after the environment
 * @throws ConfigValidationError when any value is out of range
 */
export function loadResilienceConfig(
  env: Env = process.env,
  overrides: Partial<ResilienceConfig> = {}
): ResilienceConfig {
  const d = RESILIENCE_DEFAULTS;

  const candidate = {
    rateLimits: loadRateLimits(env),
    circuitBreaker: {
      errorThreshold: safeParseInt(env.CB_ERROR_THRESHOLD, d.circuitBreaker.errorThreshold),
      errorTimeoutMs: parseSecondsToMs(env.CB_ERROR_TIMEOUT_SEC, d.circuitBreaker.errorTimeoutMs),
      circuitTimeoutMs: parseSecondsToMs(env.CB_CIRCUIT_TIMEOUT_SEC, d.circuitBreaker.circuitTimeoutMs),
      singleProbe: parseBoolean(env.CB_SINGLE_PROBE, d.circuitBreaker.singleProbe),
    },
    failover: {
      enabled: parseBoolean(env.FAILOVER_ENABLED, d.failover.enabled),
      autoRecovery: parseBoolean(env.FAILOVER_AUTO_RECOVERY, d.failover.autoRecovery),
      maxRecoveryAttempts: safeParseInt(env.FAILOVER_MAX_RECOVERY_ATTEMPTS, d.failover.maxRecoveryAttempts),
      recoveryBackoffMs: parseSecondsToMs(env.FAILOVER_RECOVERY_BACKOFF_SEC, d.failover.recoveryBackoffMs),
      emergencyShutdown: parseBoolean(env.FAILOVER_EMERGENCY_SHUTDOWN, d.failover.emergencyShutdown),
      notificationEnabled: parseBoolean(env.FAILOVER_NOTIFICATIONS, d.failover.notificationEnabled),
      checkIntervalMs: parseSecondsToMs(env.FAILOVER_CHECK_INTERVAL_SEC, d.failover.checkIntervalMs),
      stopTimeoutMs: d.failover.stopTimeoutMs,
    },
    retry: {
      maxAttempts: safeParseInt(env.RETRY_MAX_ATTEMPTS, d.retry.maxAttempts),
      initialDelayMs: parseSecondsToMs(env.RETRY_INITIAL_DELAY_SEC, d.retry.initialDelayMs),
      maxDelayMs: parseSecondsToMs(env.RETRY_MAX_DELAY_SEC, d.retry.maxDelayMs),
      backoffMultiplier: safeParseFloat(env.RETRY_BACKOFF_MULTIPLIER, d.retry.backoffMultiplier),
    },
    metrics: {
      enabled: parseBoolean(env.METRICS_ENABLED, d.metrics.enabled),
      collectionIntervalMs: parseSecondsToMs(env.METRICS_INTERVAL_SEC, d.metrics.collectionIntervalMs),
      maxPoints: safeParseInt(env.METRICS_MAX_POINTS, d.metrics.maxPoints),
      retentionMs: Math.round(
        safeParseFloat(env.METRICS_RETENTION_DAYS, d.metrics.retentionMs / DAY_MS) * DAY_MS
      ),
    },
    healthChecks: { ...d.healthChecks },
    ...overrides,
  };

  return validateOrThrow(ResilienceConfigSchema, candidate, 'resilience config');
}
