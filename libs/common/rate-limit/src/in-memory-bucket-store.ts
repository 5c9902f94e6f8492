/**
 * In-memory bucket registry for a single process
 *
 * All methods are synchronous, so each one runs to completion on the event
 * loop before any other request handler can touch the map.
 */

import { Logger } from '@nestjs/common';
import { BucketStore } from './bucket-store';
import { BucketState } from './rate-limit.types';

export interface InMemoryBucketStoreOptions {
  maxBuckets: number;
  /** Buckets for which this returns true may be dropped first when the store is full */
  isReclaimable?: (state: BucketState) => boolean;
}

export class InMemoryBucketStore implements BucketStore {
  private readonly logger = new Logger(InMemoryBucketStore.name);
  // Map iteration order doubles as recency order: touched keys are re-inserted
  private readonly buckets = new Map<string, BucketState>();

  private readonly lowWater: number;

  constructor(private readonly options: InMemoryBucketStoreOptions) {
    if (!Number.isInteger(options.maxBuckets) || options.maxBuckets < 1) {
      throw new Error(`Invalid maxBuckets: ${options.maxBuckets}`);
    }
    this.lowWater = Math.min(options.maxBuckets - 1, Math.floor(options.maxBuckets * 0.9));
  }

  get size(): number {
    return this.buckets.size;
  }

  compute<T>(
    key: string,
    create: () => BucketState,
    fn: (current: BucketState) => [BucketState, T],
  ): T {
    let current = this.buckets.get(key);
    if (current === undefined) {
      this.makeRoom();
      current = create();
      this.logger.debug(`Created bucket ${key}`);
    } else {
      this.buckets.delete(key);
    }

    let next = current;
    try {
      const [updated, result] = fn(current);
      next = updated;
      return result;
    } finally {
      this.buckets.set(key, next);
    }
  }

  peek(key: string): BucketState | undefined {
    return this.buckets.get(key);
  }

  delete(key: string): boolean {
    return this.buckets.delete(key);
  }

  clear(): number {
    const removed = this.buckets.size;
    this.buckets.clear();
    return removed;
  }

  /**
   * Make room before an insert once the registry is at maxBuckets.
   * Reclaimable buckets go first, then the least recently used, until the
   * registry is down to the low-water mark; the sweep therefore runs at most
   * once per (maxBuckets - lowWater) inserts.
   */
  private makeRoom(): void {
    if (this.buckets.size < this.options.maxBuckets) {
      return;
    }

    let reclaimed = 0;
    const isReclaimable = this.options.isReclaimable;
    if (isReclaimable) {
      for (const [key, state] of this.buckets) {
        if (isReclaimable(state)) {
          this.buckets.delete(key);
          reclaimed++;
        }
      }
    }

    let evicted = 0;
    while (this.buckets.size > this.lowWater) {
      const oldest = this.buckets.keys().next();
      if (oldest.done) {
        break;
      }
      this.buckets.delete(oldest.value);
      evicted++;
    }

    this.logger.log(
      `Bucket registry at capacity: reclaimed ${reclaimed} full, evicted ${evicted} least recently used`,
    );
  }
}
