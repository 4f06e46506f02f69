export { TokenBucket } from './token-bucket';
export type { TokenBucketConfig, TokenBucketDeps, ConsumeOptions } from './token-bucket';
export { RateLimiter, DEFAULT_LIMIT_KEY } from './rate-limiter';
export type { RateLimiterDeps } from './rate-limiter';
