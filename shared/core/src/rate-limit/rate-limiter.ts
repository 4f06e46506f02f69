/**
 * Named registry of token buckets, one per exchange call class
 * (`default`, `order`, `position`, `market`, `account`, ...).
 *
 * A `default` bucket always exists; unknown keys fall back to it.
 */

import { RESILIENCE_DEFAULTS, RateLimitDefinition } from '@tradeguard/config';
import type { RateLimitInfo } from '@tradeguard/types';
import type { Clock } from '../async/clock';
import { ConfigurationError } from '../error-handling';
import { createLogger, ILogger } from '../logging';
import { ConsumeOptions, TokenBucket } from './token-bucket';

export const DEFAULT_LIMIT_KEY = 'default';

export interface RateLimiterDeps {
  logger?: ILogger;
  clock?: Clock;
}

export class RateLimiter {
  private readonly buckets = new Map<string, TokenBucket>();
  private stats = new Map<string, number>();
  private rejections = new Map<string, number>();
  private readonly logger: ILogger;

  constructor(
    limits: Record<string, RateLimitDefinition> = RESILIENCE_DEFAULTS.rateLimits,
    private readonly deps: RateLimiterDeps = {}
  ) {
    this.logger = deps.logger ?? createLogger('rate-limiter');

    for (const [key, limit] of Object.entries(limits)) {
      this.addLimit(key, limit.maxTokens, limit.intervalMs);
    }

    if (!this.buckets.has(DEFAULT_LIMIT_KEY)) {
      const fallback = RESILIENCE_DEFAULTS.rateLimits.default;
      this.addLimit(DEFAULT_LIMIT_KEY, fallback.maxTokens, fallback.intervalMs);
    }
  }

  /**
   * Create or overwrite the bucket for `key`: `maxTokens` calls per `intervalMs`.
   */
  addLimit(key: string, maxTokens: number, intervalMs: number): void {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new ConfigurationError(`intervalMs for rate limit "${key}" must be positive, got ${intervalMs}`, {
        field: `rateLimits.${key}.intervalMs`,
      });
    }

    const bucket = new TokenBucket(
      { name: key, maxTokens, refillRate: maxTokens / (intervalMs / 1000) },
      { logger: this.logger, clock: this.deps.clock }
    );
    this.buckets.set(key, bucket);
    this.logger.debug('Rate limit configured', { key, maxTokens, intervalMs });
  }

  /**
   * Acquire `tokens` from the bucket for `key`.
   *
   * Every call counts toward the usage of the bucket that served it, granted
   * or not; refusals also count as rejections. Unknown keys fall back to, and
   * are counted under, `default`.
   */
  async limit(key: string = DEFAULT_LIMIT_KEY, tokens = 1, options: ConsumeOptions = {}): Promise<boolean> {
    let bucketKey = key;
    let bucket = this.buckets.get(key);
    if (!bucket) {
      this.logger.warn(`Rate limit key '${key}' not found, using default`, { key });
      bucketKey = DEFAULT_LIMIT_KEY;
      bucket = this.getDefaultBucket();
    }

    increment(this.stats, bucketKey);

    const granted = await bucket.consume(tokens, options);
    if (!granted) {
      increment(this.rejections, bucketKey);
    }
    return granted;
  }

  hasLimit(key: string): boolean {
    return this.buckets.has(key);
  }

  getLimits(): Record<string, RateLimitInfo> {
    const limits: Record<string, RateLimitInfo> = {};
    for (const [key, bucket] of this.buckets) {
      limits[key] = bucket.getInfo();
    }
    return limits;
  }

  /** Calls per key since construction or the last resetStats(). */
  getStats(): Record<string, number> {
    return Object.fromEntries(this.stats);
  }

  getRejections(): Record<string, number> {
    return Object.fromEntries(this.rejections);
  }

  resetStats(): void {
    this.stats = new Map();
    this.rejections = new Map();
  }

  /** 0 for unknown keys. */
  getTokenCount(key: string = DEFAULT_LIMIT_KEY): number {
    return this.buckets.get(key)?.getTokenCount() ?? 0;
  }

  private getDefaultBucket(): TokenBucket {
    const bucket = this.buckets.get(DEFAULT_LIMIT_KEY);
    if (!bucket) {
      // addLimit() cannot remove buckets, and the constructor creates the default
      throw new ConfigurationError('Default rate limit bucket is missing', { field: 'rateLimits.default' });
    }
    return bucket;
  }
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}
