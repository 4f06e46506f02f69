/**
 * Zod Schema Validation for Resilience Config
 *
 * Runtime validation for configuration objects. Catches malformed configs
 * that pass TypeScript compile-time checks (env overrides, JSON files) at
 * load time instead of at the first outbound call.
 *
 * Validation is NOT performed on the call path. Once configs are validated
 * at startup they are trusted during operation.
 */

import { z } from 'zod';

// =============================================================================
// Primitive Schemas
// =============================================================================

const PositiveMs = z.number().int().positive();
const NonNegativeMs = z.number().int().nonnegative();

export const RateLimitSchema = z.object({
  maxTokens: z.number().positive('maxTokens must be positive').finite(),
  intervalMs: z.number().positive('intervalMs must be positive').finite(),
});

/**
 * Limit keys are lower-case identifiers (`order`, `market`, `funding-rate`).
 */
export const RateLimitKeySchema = z
  .string()
  .regex(/^[a-z][a-z0-9_-]*$/, 'Rate limit keys must be lower-case identifiers');

export const RateLimitsSchema = z
  .record(RateLimitKeySchema, RateLimitSchema)
  .refine(limits => 'default' in limits, {
    message: 'A "default" rate limit is required',
  });

// =============================================================================
// Component Schemas
// =============================================================================

export const CircuitBreakerConfigSchema = z.object({
  errorThreshold: z.number().int().min(1),
  errorTimeoutMs: NonNegativeMs,
  circuitTimeoutMs: NonNegativeMs,
  singleProbe: z.boolean(),
});

export const FailoverConfigSchema = z.object({
  enabled: z.boolean(),
  autoRecovery: z.boolean(),
  maxRecoveryAttempts: z.number().int().min(1),
  recoveryBackoffMs: NonNegativeMs,
  emergencyShutdown: z.boolean(),
  notificationEnabled: z.boolean(),
  checkIntervalMs: PositiveMs,
  stopTimeoutMs: NonNegativeMs,
});

export const RetryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1),
    initialDelayMs: NonNegativeMs,
    maxDelayMs: NonNegativeMs,
    backoffMultiplier: z.number().min(1),
  })
  .refine(retry => retry.maxDelayMs >= retry.initialDelayMs, {
    message: 'maxDelayMs must be >= initialDelayMs',
    path: ['maxDelayMs'],
  });

export const MetricsConfigSchema = z.object({
  enabled: z.boolean(),
  collectionIntervalMs: PositiveMs,
  maxPoints: z.number().int().positive(),
  retentionMs: PositiveMs,
});

export const HealthCheckConfigSchema = z.object({
  streamStaleAfterMs: PositiveMs,
  strategySignalTimeoutMs: PositiveMs,
});

export const ResilienceConfigSchema = z.object({
  rateLimits: RateLimitsSchema,
  circuitBreaker: CircuitBreakerConfigSchema,
  failover: FailoverConfigSchema,
  retry: RetryConfigSchema,
  metrics: MetricsConfigSchema,
  healthChecks: HealthCheckConfigSchema,
});

export type RateLimitConfig = z.infer<typeof RateLimitSchema>;
export type CircuitBreakerSettings = z.infer<typeof CircuitBreakerConfigSchema>;
export type FailoverSettings = z.infer<typeof FailoverConfigSchema>;
export type RetrySettings = z.infer<typeof RetryConfigSchema>;
export type MetricsSettings = z.infer<typeof MetricsConfigSchema>;
export type HealthCheckSettings = z.infer<typeof HealthCheckConfigSchema>;
export type ResilienceConfig = z.infer<typeof ResilienceConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Thrown when configuration fails schema validation.
 */
export class ConfigValidationError extends Error {
  constructor(
    readonly context: string,
    readonly issues: ValidationIssue[]
  ) {
    super(
      `Config validation failed for ${context}:\n` +
        issues.map(issue => `  - ${issue.path || '(root)'}: ${issue.message}`).join('\n')
    );
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validation result with data or per-path errors.
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: ValidationIssue[];
}

/**
 * Validate data against a schema and return detailed result.
 * Does NOT throw - returns result object for handling.
 */
export function validateWithDetails<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Validate data and throw on failure.
 * Use at startup/load time, not in hot paths.
 *
 * @throws ConfigValidationError listing every failing path
 */
export function validateOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): T {
  const result = validateWithDetails(schema, data);
  if (result.success && result.data !== undefined) {
    return result.data;
  }
  throw new ConfigValidationError(context, result.errors ?? []);
}
