// Exponential backoff retry for exchange calls
//
// delay(attempt) = min(initialDelayMs * backoffMultiplier^(attempt - 1), maxDelayMs)
// With the defaults (3 attempts, 5 s, x2) a failing call waits 5 s then 10 s.

import { RESILIENCE_DEFAULTS } from '@tradeguard/config';
import { Clock, systemClock } from '../async/clock';
import { getErrorMessage, isRetryableError } from '../error-handling';
import { createLogger, ServiceLogger } from '../logging';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Add up to 25% random jitter to each delay */
  jitter: boolean;
  /** Decides whether a failure is worth another attempt */
  retryCondition: (error: unknown) => boolean;
  /** Called before each wait */
  onRetry: (attempt: number, error: unknown, delayMs: number) => void;
}

export interface RetryResult<T> {
  success: boolean;
  result?: T;
  error?: unknown;
  attempts: number;
  totalDelayMs: number;
}

export interface RetryMechanismDeps {
  logger?: ServiceLogger;
  clock?: Clock;
}

export class RetryMechanism {
  private readonly config: RetryConfig;
  private readonly logger: ServiceLogger;
  private readonly clock: Clock;

  constructor(config: Partial<RetryConfig> = {}, deps: RetryMechanismDeps = {}) {
    const defaults = RESILIENCE_DEFAULTS.retry;
    this.config = {
      maxAttempts: Math.max(1, config.maxAttempts ?? defaults.maxAttempts),
      initialDelayMs: config.initialDelayMs ?? defaults.initialDelayMs,
      maxDelayMs: config.maxDelayMs ?? defaults.maxDelayMs,
      backoffMultiplier: config.backoffMultiplier ?? defaults.backoffMultiplier,
      jitter: config.jitter ?? false,
      retryCondition: config.retryCondition ?? isRetryableError,
      onRetry: config.onRetry ?? (() => undefined),
    };
    this.logger = deps.logger ?? createLogger('retry-mechanism');
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Run `fn` until it resolves, the retry condition rejects the error, or
   * attempts run out. Never throws; the last error is in the result.
   */
  async execute<T>(fn: () => Promise<T>): Promise<RetryResult<T>> {
    let lastError: unknown;
    let totalDelayMs = 0;
    let attempt = 1;

    for (; attempt <= this.config.maxAttempts; attempt++) {
      try {
        const result = await fn();
        return { success: true, result, attempts: attempt, totalDelayMs };
      } catch (error) {
        lastError = error;

        if (!this.config.retryCondition(error)) {
          this.logger.debug('Error not retryable, giving up', { error: getErrorMessage(error), attempt });
          break;
        }

        if (attempt === this.config.maxAttempts) {
          break;
        }

        const delayMs = this.calculateDelay(attempt);
        this.logger.warn(`Attempt ${attempt} failed, retrying in ${delayMs}ms`, {
          error: getErrorMessage(error),
          attempt,
          maxAttempts: this.config.maxAttempts,
        });

        this.config.onRetry(attempt, error, delayMs);
        await this.clock.sleep(delayMs);
        totalDelayMs += delayMs;
      }
    }

    return {
      success: false,
      error: lastError,
      attempts: Math.min(this.config.maxAttempts, attempt),
      totalDelayMs,
    };
  }

  /** Delay before attempt `attempt + 1`. */
  calculateDelay(attempt: number): number {
    let delay = this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    delay = Math.min(delay, this.config.maxDelayMs);

    if (this.config.jitter) {
      delay += delay * 0.25 * Math.random();
    }

    return Math.floor(delay);
  }
}
