/**
 * Shared Configuration for the Resilience Control Plane
 *
 * - system-constants.ts: RESILIENCE_DEFAULTS
 * - schemas/: zod validation for every config section
 * - utils/env-parsing.ts: safe environment value parsing
 * - resilience-config.ts: loadResilienceConfig() (env + overrides + validation)
 *
 * This package must not import @tradeguard/core; it throws its own
 * ConfigValidationError.
 */

export { RESILIENCE_DEFAULTS } from './system-constants';
export type { RateLimitDefinition, ResilienceDefaults } from './system-constants';

export {
  RateLimitSchema,
  RateLimitKeySchema,
  RateLimitsSchema,
  CircuitBreakerConfigSchema,
  FailoverConfigSchema,
  RetryConfigSchema,
  MetricsConfigSchema,
  HealthCheckConfigSchema,
  ResilienceConfigSchema,
  ConfigValidationError,
  validateWithDetails,
  validateOrThrow,
} from './schemas';
export type {
  RateLimitConfig,
  CircuitBreakerSettings,
  FailoverSettings,
  RetrySettings,
  MetricsSettings,
  HealthCheckSettings,
  ResilienceConfig,
  ValidationIssue,
  ValidationResult,
} from './schemas';

export {
  safeParseInt,
  safeParseFloat,
  parseSecondsToMs,
  parseBoolean,
  parseRateLimitSpec,
} from './utils/env-parsing';

export { loadResilienceConfig } from './resilience-config';
