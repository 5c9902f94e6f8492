/**
 * Admission Controller
 * Token bucket admission per caller-supplied key
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ERRORS } from '@tollgate/common/errors';
import { Clock, CLOCK } from '@tollgate/common/types';
import { BUCKET_STORE, BucketStore } from './bucket-store';
import {
  Admission,
  BucketInfo,
  RATE_LIMIT_OPTIONS,
  RateLimitOptions,
  RateLimitPolicy,
  RateLimitPolicyName,
} from './rate-limit.types';
import { createBucket, msUntilAvailable, refill, take } from './token-bucket';

function toWaitSeconds(ms: number): number {
  return Math.ceil(ms / 1000);
}

@Injectable()
export class AdmissionControllerService {
  private readonly logger = new Logger(AdmissionControllerService.name);

  constructor(
    @Inject(BUCKET_STORE) private readonly store: BucketStore,
    @Inject(RATE_LIMIT_OPTIONS) private readonly options: RateLimitOptions,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  policy(name: RateLimitPolicyName = 'default'): RateLimitPolicy {
    return this.options.policies[name];
  }

  /**
   * Try to take `cost` tokens from the bucket at `key`, creating it full
   * under `policyName` on first sight. A denied attempt takes nothing.
   */
  check(key: string, policyName: RateLimitPolicyName = 'default', cost = 1): Admission {
    const policy = this.policy(policyName);
    if (!Number.isInteger(cost) || cost < 1 || cost > policy.capacity) {
      throw new RangeError(`Cost must be an integer between 1 and ${policy.capacity}, got ${cost}`);
    }

    const now = this.clock.now();
    const admission = this.store.compute<Admission>(
      key,
      () => createBucket(policy, now),
      (current) => {
        const { state, allowed } = take(current, cost, now);
        if (allowed) {
          return [state, { allowed: true, remaining: state.available, limit: state.capacity }];
        }
        return [
          state,
          {
            allowed: false,
            remaining: state.available,
            limit: state.capacity,
            waitSeconds: toWaitSeconds(msUntilAvailable(state, cost, now)),
          },
        ];
      },
    );

    if (admission.allowed) {
      this.logger.debug(`Admitted ${key}: ${admission.remaining} tokens left`);
    } else {
      this.logger.warn(`Rejected ${key}: retry in ${admission.waitSeconds}s`);
    }
    return admission;
  }

  tryConsume(key: string, policyName: RateLimitPolicyName = 'default', cost = 1): boolean {
    return this.check(key, policyName, cost).allowed;
  }

  /**
   * Like check(), but a rejection surfaces as RateLimitExceeded
   */
  consume(key: string, policyName: RateLimitPolicyName = 'default', cost = 1): void {
    const admission = this.check(key, policyName, cost);
    if (!admission.allowed) {
      throw ERRORS.RateLimitExceeded({
        retryAfterSeconds: admission.waitSeconds,
        remaining: admission.remaining,
        limit: admission.limit,
        maxAttempts: policyName === 'loginRoute' ? admission.limit : undefined,
      });
    }
  }

  /**
   * Inspect a bucket without consuming from it. An unseen key reports
   * a full bucket and is not created.
   */
  getInfo(key: string, policyName: RateLimitPolicyName = 'default'): BucketInfo {
    const existing = this.store.peek(key);
    if (!existing) {
      const policy = this.policy(policyName);
      return { availableTokens: policy.capacity, waitSeconds: 0, capacity: policy.capacity };
    }

    const now = this.clock.now();
    const current = refill(existing, now);
    return {
      availableTokens: current.available,
      waitSeconds: toWaitSeconds(msUntilAvailable(current, 1, now)),
      capacity: current.capacity,
    };
  }

  removeBucket(key: string): boolean {
    const removed = this.store.delete(key);
    if (removed) {
      this.logger.log(`Removed bucket ${key}`);
    }
    return removed;
  }

  clearAllBuckets(): number {
    const removed = this.store.clear();
    this.logger.log(`Cleared ${removed} buckets`);
    return removed;
  }
}
