/**
 * Token bucket for exchange call admission.
 *
 * Algorithm:
 * - Tokens refill lazily on every access at `refillRate` tokens/second
 * - Tokens cap at `maxTokens`
 * - A call consumes `tokens` (default 1); when short, a blocking caller
 *   sleeps exactly until enough tokens have accrued
 *
 * The check, the wait and the subtraction happen under one mutex per bucket,
 * so concurrent waiters are served in FIFO order and never both spend the
 * same refill.
 */

import { AsyncMutex } from '../async/async-mutex';
import { Clock, monotonicClock } from '../async/clock';
import { ConfigurationError, ErrorCode, ResilienceError } from '../error-handling';
import { createLogger, ILogger } from '../logging';
import type { RateLimitInfo } from '@tradeguard/types';

export interface TokenBucketConfig {
  maxTokens: number;
  /** Tokens per second */
  refillRate: number;
  /** Defaults to a full bucket */
  initialTokens?: number;
  /** Identifier for logging */
  name?: string;
}

export interface ConsumeOptions {
  /** Wait for tokens when short (default true) */
  block?: boolean;
  /**
   * Bound on the whole wait, lock wait included. Waiting behind another
   * consumer is bounded by a timer; the refill wait is refused up front when
   * it would not fit in what is left.
   */
  timeoutMs?: number;
}

export interface TokenBucketDeps {
  logger?: ILogger;
  clock?: Clock;
}

function assertPositiveFinite(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive finite number, got ${value}`, { field });
  }
}

export class TokenBucket {
  readonly name: string;
  readonly maxTokens: number;
  readonly refillRate: number;

  private tokens: number;
  private lastRefillTime: number;
  private readonly mutex = new AsyncMutex();
  private readonly logger: ILogger;
  private readonly clock: Clock;

  constructor(config: TokenBucketConfig, deps: TokenBucketDeps = {}) {
    assertPositiveFinite(config.maxTokens, 'maxTokens');
    assertPositiveFinite(config.refillRate, 'refillRate');

    const initial = config.initialTokens ?? config.maxTokens;
    if (!Number.isFinite(initial) || initial < 0 || initial > config.maxTokens) {
      throw new ConfigurationError(
        `initialTokens must be within [0, ${config.maxTokens}], got ${initial}`,
        { field: 'initialTokens' }
      );
    }

    this.name = config.name ?? 'bucket';
    this.maxTokens = config.maxTokens;
    this.refillRate = config.refillRate;
    this.tokens = initial;
    this.logger = deps.logger ?? createLogger('token-bucket');
    this.clock = deps.clock ?? monotonicClock;
    this.lastRefillTime = this.clock.now();
  }

  /**
   * Take `tokens` from the bucket.
   *
   * @returns true when granted; false when refused (non-blocking and short,
   *   wait longer than `timeoutMs`, or a request above capacity)
   */
  async consume(tokens = 1, options: ConsumeOptions = {}): Promise<boolean> {
    if (!Number.isFinite(tokens) || tokens <= 0) {
      throw new ResilienceError(`Token request must be a positive number, got ${tokens}`, ErrorCode.INVALID_ARGUMENT);
    }

    if (tokens > this.maxTokens) {
      this.logger.warn('Token request exceeds bucket capacity', {
        bucket: this.name,
        requested: tokens,
        maxTokens: this.maxTokens,
      });
      return false;
    }

    const block = options.block ?? true;

    if (!block) {
      const release = this.mutex.tryAcquire();
      if (!release) return false;
      try {
        return this.takeIfAvailable(tokens);
      } finally {
        release();
      }
    }

    const startedAt = this.clock.now();
    const release =
      options.timeoutMs === undefined
        ? await this.mutex.acquire()
        : await this.mutex.acquireWithin(options.timeoutMs);
    if (!release) {
      this.logger.debug('Timed out waiting behind another consumer', {
        bucket: this.name,
        timeoutMs: options.timeoutMs,
      });
      return false;
    }
    try {
      if (this.takeIfAvailable(tokens)) return true;

      const waitMs = ((tokens - this.tokens) / this.refillRate) * 1000;

      if (options.timeoutMs !== undefined) {
        const remainingMs = options.timeoutMs - (this.clock.now() - startedAt);
        if (waitMs > remainingMs) {
          this.logger.debug('Token wait exceeds timeout', {
            bucket: this.name,
            waitMs,
            timeoutMs: options.timeoutMs,
          });
          return false;
        }
      }

      await this.clock.sleep(waitMs);
      this.refill();
      this.tokens = Math.max(0, this.tokens - tokens);
      return true;
    } finally {
      release();
    }
  }

  /**
   * Refill and return the current level.
   */
  getTokenCount(): number {
    this.refill();
    return this.tokens;
  }

  getInfo(): RateLimitInfo {
    return {
      maxTokens: this.maxTokens,
      refillRate: this.refillRate,
      currentTokens: this.getTokenCount(),
    };
  }

  private takeIfAvailable(tokens: number): boolean {
    this.refill();
    if (this.tokens >= tokens) {
      this.tokens -= tokens;
      return true;
    }
    return false;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedMs = now - this.lastRefillTime;

    if (elapsedMs > 0) {
      this.tokens = Math.min(this.maxTokens, this.tokens + (elapsedMs / 1000) * this.refillRate);
      this.lastRefillTime = now;
    }
  }
}
