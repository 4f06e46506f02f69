/**
 * @tradeguard/core - Resilience control plane
 *
 * Sub-path imports are available for each area:
 *
 * ```typescript
 * import { CircuitBreakerRegistry } from '@tradeguard/core/resilience';
 * import { RecordingLogger } from '@tradeguard/core/logging';
 * ```
 *
 * @module @tradeguard/core
 */

// =============================================================================
// Infrastructure
// =============================================================================

export * from './logging';
export * from './async';

export {
  ErrorCode,
  ErrorSeverity,
  ResilienceError,
  ConfigurationError,
  RateLimitedError,
  CircuitOpenError,
  ExchangeCallError,
  TimeoutError,
  success,
  failure,
  isAuthenticationError,
  isRetryableError,
  getErrorMessage,
  formatErrorForLog,
} from './error-handling';
export type { Result, ResilienceErrorOptions } from './error-handling';

// =============================================================================
// Control plane
// =============================================================================

export * from './rate-limit';
export * from './resilience';
export * from './exchange';
export * from './health';
export * from './monitoring';
export * from './notifications';
