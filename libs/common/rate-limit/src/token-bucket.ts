/**
 * Token bucket arithmetic
 *
 * Refill is interval based: every whole elapsed window adds refillTokens,
 * capped at capacity. Every function here is pure; given the same state and
 * the same `now` it returns the same result, so racing readers agree.
 */

import { BucketState, RateLimitPolicy } from './rate-limit.types';

export function createBucket(policy: RateLimitPolicy, now: number): BucketState {
  return {
    capacity: policy.capacity,
    refillTokens: policy.refillTokens,
    refillMs: policy.refillSeconds * 1000,
    available: policy.capacity,
    lastRefillAt: now,
  };
}

/**
 * Apply every refill window that has fully elapsed since lastRefillAt.
 * The window boundary advances by whole windows, never to `now`, so a
 * partially elapsed window keeps counting.
 */
export function refill(state: BucketState, now: number): BucketState {
  const elapsed = now - state.lastRefillAt;
  // Also covers a clock that moved backwards
  if (elapsed < state.refillMs) {
    return state;
  }

  const windows = Math.floor(elapsed / state.refillMs);
  return {
    ...state,
    available: Math.min(state.capacity, state.available + windows * state.refillTokens),
    lastRefillAt: state.lastRefillAt + windows * state.refillMs,
  };
}

export function take(
  state: BucketState,
  cost: number,
  now: number,
): { state: BucketState; allowed: boolean } {
  const current = refill(state, now);
  if (current.available < cost) {
    return { state: current, allowed: false };
  }
  return {
    state: { ...current, available: current.available - cost },
    allowed: true,
  };
}

/**
 * Milliseconds until `cost` tokens can be taken; 0 when they can be now.
 */
export function msUntilAvailable(state: BucketState, cost: number, now: number): number {
  const current = refill(state, now);
  if (current.available >= cost) {
    return 0;
  }
  if (cost > current.capacity) {
    return Infinity;
  }

  const windowsNeeded = Math.ceil((cost - current.available) / current.refillTokens);
  return current.lastRefillAt + windowsNeeded * current.refillMs - now;
}

/**
 * A full bucket carries no information: dropping it and recreating it
 * later is indistinguishable from keeping it.
 */
export function isFull(state: BucketState, now: number): boolean {
  return refill(state, now).available >= state.capacity;
}
