/**
 * Resilience Module
 *
 * - CircuitBreaker / CircuitBreakerRegistry: per-operation failure isolation
 * - RetryMechanism: exponential backoff for transient failures
 * - FailoverManager: component supervision, recovery and emergency shutdown
 *
 * @module resilience
 */

export { CircuitBreaker, CircuitBreakerRegistry, CircuitState } from './circuit-breaker';
export type { CircuitBreakerConfig, CircuitBreakerDeps, CircuitBreakerStats } from './circuit-breaker';

export { RetryMechanism } from './retry-mechanism';
export type { RetryConfig, RetryResult, RetryMechanismDeps } from './retry-mechanism';

export { FailoverManager } from './failover-manager';
export type { ComponentRegistration, FailoverManagerDeps } from './failover-manager';
