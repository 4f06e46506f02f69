/**
 * Shared Error Handling Utilities
 *
 * Error codes, the ResilienceError hierarchy, the Result type used by
 * `GuardedExchangeClient.callSafe`, and error classification helpers used by
 * the retry layer.
 *
 * Capacity exhaustion and open circuits are ordinary outcomes for the core
 * components (boolean `false`). Only the guarded client turns them into
 * RateLimitedError / CircuitOpenError.
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_ARGUMENT = 1001,
  INVALID_STATE = 1005,
  OPERATION_TIMEOUT = 1007,

  // Admission errors (2000-2999)
  RATE_LIMITED = 2000,
  CIRCUIT_OPEN = 2001,

  // Exchange errors (3000-3999)
  EXCHANGE_CALL_FAILED = 3000,
  AUTHENTICATION_FAILED = 3001,
  RESPONSE_VALIDATION_FAILED = 3002,

  // Configuration errors (6000-6999)
  INVALID_CONFIG = 6002,

  // Supervision errors (7000-7999)
  HEALTH_CHECK_FAILED = 7000,
  RECOVERY_FAILED = 7001,
  SHUTDOWN_TIMEOUT = 7003,
}

export enum ErrorSeverity {
  /** Expected outcome, no action required */
  INFO = 'info',
  /** Unexpected but recoverable */
  WARNING = 'warning',
  /** May impact trading */
  ERROR = 'error',
  /** Operator attention required */
  CRITICAL = 'critical',
}

// =============================================================================
// Custom Error Classes
// =============================================================================

export interface ResilienceErrorOptions {
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base error class for the resilience layer.
 * Carries structured information for logging.
 */
export class ResilienceError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    options: ResilienceErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResilienceError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: ErrorCode[this.code],
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause === undefined ? undefined : getErrorMessage(this.cause),
      stack: this.stack,
    };
  }
}

/**
 * Invalid constructor arguments or configuration.
 */
export class ConfigurationError extends ResilienceError {
  readonly field?: string;

  constructor(message: string, options: { field?: string; context?: Record<string, unknown> } = {}) {
    super(message, ErrorCode.INVALID_CONFIG, {
      severity: ErrorSeverity.CRITICAL,
      context: { ...options.context, field: options.field },
    });
    this.name = 'ConfigurationError';
    this.field = options.field;
  }
}

/**
 * The rate limiter refused the call (bucket empty and not allowed to wait,
 * or the wait would exceed the caller's timeout).
 */
export class RateLimitedError extends ResilienceError {
  constructor(readonly limitKey: string, readonly method: string) {
    super(`Rate limit exceeded for ${method} (limit "${limitKey}")`, ErrorCode.RATE_LIMITED, {
      severity: ErrorSeverity.WARNING,
      context: { limitKey, method },
    });
    this.name = 'RateLimitedError';
  }
}

/**
 * The circuit breaker for the operation is open.
 */
export class CircuitOpenError extends ResilienceError {
  constructor(readonly operation: string) {
    super(`Circuit breaker is open for ${operation}`, ErrorCode.CIRCUIT_OPEN, {
      severity: ErrorSeverity.WARNING,
      context: { operation },
    });
    this.name = 'CircuitOpenError';
  }
}

/**
 * The transport call failed after all retry attempts.
 */
export class ExchangeCallError extends ResilienceError {
  readonly method: string;
  readonly attempts: number;

  constructor(
    message: string,
    options: { method: string; attempts: number; code?: ErrorCode; cause?: unknown }
  ) {
    super(message, options.code ?? ErrorCode.EXCHANGE_CALL_FAILED, {
      severity: ErrorSeverity.ERROR,
      cause: options.cause,
      context: { method: options.method, attempts: options.attempts },
    });
    this.name = 'ExchangeCallError';
    this.method = options.method;
    this.attempts = options.attempts;
  }
}

/**
 * An operation exceeded its deadline.
 */
export class TimeoutError extends ResilienceError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms`, ErrorCode.OPERATION_TIMEOUT, {
      severity: ErrorSeverity.WARNING,
      context: { operation, timeoutMs },
    });
    this.name = 'TimeoutError';
  }
}

// =============================================================================
// Result Type
// =============================================================================

export type Result<T, E = ResilienceError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function failure<E>(error: E): Result<never, E> {
  return { success: false, error };
}

// =============================================================================
// Error Classification
// =============================================================================

/**
 * Exchange status codes meaning "bad credentials". Retrying them only burns
 * rate-limit budget.
 */
const AUTHENTICATION_STATUS_CODES = new Set([401, 10003, 10004]);

function readNumericField(error: unknown, field: 'status' | 'statusCode' | 'retCode'): number | undefined {
  if (typeof error !== 'object' || error === null || !(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'number' ? value : undefined;
}

/**
 * True for credential failures, which are never retried.
 */
export function isAuthenticationError(error: unknown): boolean {
  if (error instanceof ResilienceError) {
    return error.code === ErrorCode.AUTHENTICATION_FAILED;
  }

  for (const field of ['status', 'statusCode', 'retCode'] as const) {
    const code = readNumericField(error, field);
    if (code !== undefined && AUTHENTICATION_STATUS_CODES.has(code)) return true;
  }

  const message = getErrorMessage(error).toLowerCase();
  return message.includes('401') || message.includes('invalid api key') || message.includes('unauthorized');
}

/**
 * Check if an error is worth retrying.
 */
export function isRetryableError(error: unknown): boolean {
  if (isAuthenticationError(error)) return false;

  if (error instanceof ResilienceError) {
    return error.code === ErrorCode.OPERATION_TIMEOUT || error.code === ErrorCode.EXCHANGE_CALL_FAILED;
  }

  const message = getErrorMessage(error).toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('rate limit') ||
    message.includes('connection') ||
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('socket hang up') ||
    message.includes('503')
  );
}

// =============================================================================
// Error Formatting
// =============================================================================

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Format error for structured logging.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof ResilienceError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: getErrorMessage(error) };
}
