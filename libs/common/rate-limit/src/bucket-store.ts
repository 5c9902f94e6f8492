import { BucketState } from './rate-limit.types';

export const BUCKET_STORE = Symbol('BUCKET_STORE');

/**
 * Registry of buckets by key.
 *
 * Implementations must make compute() atomic per key: the bucket is created
 * at most once, and no other compute() on the same key observes the state
 * between reading `current` and storing the returned state. The token bucket
 * arithmetic stays outside the store.
 */
export interface BucketStore {
  /**
   * Create the bucket if absent, then replace it with the state returned by fn.
   * Returns fn's result.
   */
  compute<T>(
    key: string,
    create: () => BucketState,
    fn: (current: BucketState) => [BucketState, T],
  ): T;

  /** Current state without creating or touching the bucket */
  peek(key: string): BucketState | undefined;

  delete(key: string): boolean;

  /** Remove every bucket; returns how many were removed */
  clear(): number;

  readonly size: number;
}
