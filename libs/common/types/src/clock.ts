/**
 * Wall clock in epoch milliseconds, injectable so expiry and refill
 * can be driven by tests
 */
export interface Clock {
  now(): number;
}

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
  now: () => Date.now(),
};
