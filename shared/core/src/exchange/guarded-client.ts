/**
 * Guarded Exchange Client
 *
 * Wraps an ExchangeTransport so every call goes through, in order:
 *   1. rate limiter bucket (key resolved from the method name, or given)
 *   2. circuit breaker for the operation (defaults to the method name)
 *   3. retry with exponential backoff (authentication errors never retried)
 *   4. optional zod validation of the response
 *
 * The breaker sees one outcome per call, after retries.
 *
 * @example
 * ```typescript
 * const client = new GuardedExchangeClient(transport, { rateLimiter, registry });
 * const result = await client.callSafe('getWalletBalance', { accountType: 'UNIFIED' });
 * if (!result.success) logger.warn(result.error.message);
 * ```
 */

import type { ExchangeTransport } from '@tradeguard/types';
import type { z } from 'zod';
import { Clock, monotonicClock } from '../async/clock';
import {
  CircuitOpenError,
  ErrorCode,
  ExchangeCallError,
  failure,
  getErrorMessage,
  isAuthenticationError,
  RateLimitedError,
  ResilienceError,
  Result,
  success,
} from '../error-handling';
import { createLogger, ServiceLogger } from '../logging';
import { DEFAULT_LIMIT_KEY, RateLimiter } from '../rate-limit';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker';
import { RetryConfig, RetryMechanism } from '../resilience/retry-mechanism';

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface GuardedCallOptions {
  /** Rate limit key; resolved from the method name when omitted */
  limitKey?: string;
  /** Circuit breaker name; the method name when omitted */
  operation?: string;
  /** Wait for rate limit tokens (default true) */
  block?: boolean;
  timeoutMs?: number;
  tokens?: number;
}

export interface GuardedClientStats {
  calls: number;
  successes: number;
  failures: number;
  rejectedByLimiter: number;
  rejectedByCircuit: number;
  avgLatencyMs: number;
  maxLatencyMs: number;
}

export interface GuardedExchangeClientDeps {
  rateLimiter: RateLimiter;
  registry: CircuitBreakerRegistry;
  retry?: Partial<RetryConfig>;
  logger?: ServiceLogger;
  clock?: Clock;
}

// First match wins; market data goes first so "getOrderbook" is not an order call.
const LIMIT_KEY_RULES: ReadonlyArray<{ key: string; keywords: readonly string[] }> = [
  { key: 'market', keywords: ['market', 'kline', 'ticker', 'orderbook', 'instrument', 'servertime'] },
  { key: 'position', keywords: ['position', 'leverage'] },
  { key: 'order', keywords: ['order'] },
  { key: 'account', keywords: ['account', 'wallet', 'balance'] },
];

/**
 * Map an exchange method name to a rate limit key by keyword.
 */
export function resolveLimitKey(method: string): string {
  const normalized = method.toLowerCase().replace(/[^a-z]/g, '');
  const rule = LIMIT_KEY_RULES.find(r => r.keywords.some(k => normalized.includes(k)));
  return rule?.key ?? DEFAULT_LIMIT_KEY;
}

export class GuardedExchangeClient implements ExchangeTransport {
  private readonly rateLimiter: RateLimiter;
  private readonly registry: CircuitBreakerRegistry;
  private readonly retry: RetryMechanism;
  private readonly logger: ServiceLogger;
  private readonly clock: Clock;

  private calls = 0;
  private successes = 0;
  private failures = 0;
  private rejectedByLimiter = 0;
  private rejectedByCircuit = 0;
  private latencyTotalMs = 0;
  private latencySamples = 0;
  private maxLatencyMs = 0;

  constructor(
    private readonly transport: ExchangeTransport,
    deps: GuardedExchangeClientDeps
  ) {
    this.rateLimiter = deps.rateLimiter;
    this.registry = deps.registry;
    this.logger = deps.logger ?? createLogger('guarded-client');
    this.clock = deps.clock ?? monotonicClock;
    this.retry = new RetryMechanism(
      { retryCondition: error => !isAuthenticationError(error), ...deps.retry },
      { logger: this.logger, clock: deps.clock }
    );
  }

  /**
   * Guarded call that throws the failure instead of returning it.
   *
   * @throws RateLimitedError | CircuitOpenError | ExchangeCallError
   */
  call<T>(method: string, params: Record<string, unknown> | undefined, options: GuardedCallOptions & { schema: ResponseSchema<T> }): Promise<T>;
  call(method: string, params?: Record<string, unknown>, options?: GuardedCallOptions): Promise<unknown>;
  async call<T>(
    method: string,
    params: Record<string, unknown> = {},
    options: GuardedCallOptions & { schema?: ResponseSchema<T> } = {}
  ): Promise<unknown> {
    const result = await this.execute(method, params, options);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  callSafe<T>(method: string, params: Record<string, unknown> | undefined, options: GuardedCallOptions & { schema: ResponseSchema<T> }): Promise<Result<T>>;
  callSafe(method: string, params?: Record<string, unknown>, options?: GuardedCallOptions): Promise<Result<unknown>>;
  async callSafe<T>(
    method: string,
    params: Record<string, unknown> = {},
    options: GuardedCallOptions & { schema?: ResponseSchema<T> } = {}
  ): Promise<Result<unknown>> {
    return this.execute(method, params, options);
  }

  getStats(): GuardedClientStats {
    return {
      calls: this.calls,
      successes: this.successes,
      failures: this.failures,
      rejectedByLimiter: this.rejectedByLimiter,
      rejectedByCircuit: this.rejectedByCircuit,
      avgLatencyMs: this.latencySamples > 0 ? this.latencyTotalMs / this.latencySamples : 0,
      maxLatencyMs: this.maxLatencyMs,
    };
  }

  resetStats(): void {
    this.calls = 0;
    this.successes = 0;
    this.failures = 0;
    this.rejectedByLimiter = 0;
    this.rejectedByCircuit = 0;
    this.latencyTotalMs = 0;
    this.latencySamples = 0;
    this.maxLatencyMs = 0;
  }

  private async execute<T>(
    method: string,
    params: Record<string, unknown>,
    options: GuardedCallOptions & { schema?: ResponseSchema<T> }
  ): Promise<Result<unknown>> {
    this.calls++;
    const limitKey = options.limitKey ?? resolveLimitKey(method);
    const operation = options.operation ?? method;

    const tokens = options.tokens ?? 1;
    if (!Number.isFinite(tokens) || tokens <= 0) {
      this.failures++;
      return failure(
        new ResilienceError(`Token request must be a positive number, got ${tokens}`, ErrorCode.INVALID_ARGUMENT, {
          context: { method, limitKey, tokens },
        })
      );
    }

    const admitted = await this.rateLimiter.limit(limitKey, tokens, {
      block: options.block,
      timeoutMs: options.timeoutMs,
    });
    if (!admitted) {
      this.rejectedByLimiter++;
      this.logger.warn('Exchange call rejected by rate limiter', { method, limitKey });
      return failure(new RateLimitedError(limitKey, method));
    }

    const breaker = this.registry.getCircuitBreaker(operation);
    if (!breaker.allowRequest()) {
      this.rejectedByCircuit++;
      this.logger.warn('Exchange call rejected by open circuit', { method, operation });
      return failure(new CircuitOpenError(operation));
    }

    const startedAt = this.clock.now();
    const outcome = await this.retry.execute(() => this.transport.call(method, params));
    this.recordLatency(this.clock.now() - startedAt);

    if (!outcome.success) {
      breaker.recordError();
      this.failures++;
      const code = isAuthenticationError(outcome.error)
        ? ErrorCode.AUTHENTICATION_FAILED
        : ErrorCode.EXCHANGE_CALL_FAILED;
      this.logger.error('Exchange call failed', {
        method,
        attempts: outcome.attempts,
        error: getErrorMessage(outcome.error),
      });
      return failure(
        new ExchangeCallError(`${method} failed: ${getErrorMessage(outcome.error)}`, {
          method,
          attempts: outcome.attempts,
          code,
          cause: outcome.error,
        })
      );
    }

    // The exchange answered, so the breaker counts a success even if the body is malformed
    breaker.recordSuccess();

    if (!options.schema) {
      this.successes++;
      return success(outcome.result);
    }

    const parsed = options.schema.safeParse(outcome.result);
    if (!parsed.success) {
      this.failures++;
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
      this.logger.error('Exchange response failed validation', { method, issues });
      return failure(
        new ResilienceError(`${method} returned an unexpected response`, ErrorCode.RESPONSE_VALIDATION_FAILED, {
          context: { method, issues },
        })
      );
    }

    this.successes++;
    return success(parsed.data);
  }

  private recordLatency(latencyMs: number): void {
    this.latencyTotalMs += latencyMs;
    this.latencySamples++;
    if (latencyMs > this.maxLatencyMs) {
      this.maxLatencyMs = latencyMs;
    }
  }
}
