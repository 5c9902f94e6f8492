/**
 * Tollgate Rate Limit Types
 */

export type RateLimitPolicyName = 'default' | 'loginRoute';

export interface RateLimitPolicy {
  name: RateLimitPolicyName;
  /** Maximum tokens a bucket holds */
  capacity: number;
  /** Tokens added per elapsed refill window */
  refillTokens: number;
  /** Refill window length in seconds */
  refillSeconds: number;
}

export interface RateLimitOptions {
  policies: Record<RateLimitPolicyName, RateLimitPolicy>;
  /** Path whose requests use the loginRoute policy */
  loginPath: string;
  /** Upper bound on live buckets in the registry */
  maxBuckets: number;
}

export const RATE_LIMIT_OPTIONS = Symbol('RATE_LIMIT_OPTIONS');

/**
 * Snapshot of one bucket. Timestamps are epoch milliseconds.
 */
export interface BucketState {
  readonly capacity: number;
  readonly refillTokens: number;
  readonly refillMs: number;
  readonly available: number;
  readonly lastRefillAt: number;
}

export type Admission =
  | { allowed: true; remaining: number; limit: number }
  | { allowed: false; remaining: number; limit: number; waitSeconds: number };

export interface BucketInfo {
  availableTokens: number;
  waitSeconds: number;
  capacity: number;
}
