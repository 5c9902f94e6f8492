import { ErrorCode, isTollgateError, TollgateError } from '@tollgate/common/errors';
import { ManualClock } from '../../../../test/support/manual-clock';
import { AdmissionControllerService } from './admission-controller.service';
import { InMemoryBucketStore } from './in-memory-bucket-store';
import { RateLimitOptions } from './rate-limit.types';
import { isFull } from './token-bucket';

const options: RateLimitOptions = {
  policies: {
    default: { name: 'default', capacity: 100, refillTokens: 100, refillSeconds: 60 },
    loginRoute: { name: 'loginRoute', capacity: 5, refillTokens: 5, refillSeconds: 900 },
  },
  loginPath: '/auth/login',
  maxBuckets: 1000,
};

describe('AdmissionControllerService', () => {
  let clock: ManualClock;
  let store: InMemoryBucketStore;
  let controller: AdmissionControllerService;

  beforeEach(() => {
    clock = new ManualClock();
    store = new InMemoryBucketStore({
      maxBuckets: options.maxBuckets,
      isReclaimable: (state) => isFull(state, clock.now()),
    });
    controller = new AdmissionControllerService(store, options, clock);
  });

  it('should admit five login attempts, reject the sixth, and admit again after the window', () => {
    const key = '1.2.3.4:/auth/login';

    for (let i = 0; i < 5; i++) {
      expect(controller.tryConsume(key, 'loginRoute')).toBe(true);
    }

    const rejected = controller.check(key, 'loginRoute');
    expect(rejected).toEqual({ allowed: false, remaining: 0, limit: 5, waitSeconds: 900 });

    clock.advanceSeconds(900);
    expect(controller.tryConsume(key, 'loginRoute')).toBe(true);
  });

  it('should report decreasing remaining tokens', () => {
    expect(controller.check('k', 'loginRoute')).toEqual({ allowed: true, remaining: 4, limit: 5 });
    expect(controller.check('k', 'loginRoute', 3)).toEqual({ allowed: true, remaining: 1, limit: 5 });
  });

  it('should not take anything on a denied attempt', () => {
    controller.check('k', 'loginRoute', 4);

    expect(controller.tryConsume('k', 'loginRoute', 2)).toBe(false);
    expect(controller.getInfo('k', 'loginRoute').availableTokens).toBe(1);
    expect(controller.tryConsume('k', 'loginRoute', 1)).toBe(true);
  });

  it('should round the wait up to whole seconds', () => {
    for (let i = 0; i < 5; i++) {
      controller.check('k', 'loginRoute');
    }
    clock.set(clock.now() + 100_500);

    const rejected = controller.check('k', 'loginRoute');

    expect(rejected.allowed).toBe(false);
    expect(rejected.allowed === false && rejected.waitSeconds).toBe(800);
  });

  it('should keep keys isolated', () => {
    for (let i = 0; i < 5; i++) {
      controller.check('1.1.1.1:/auth/login', 'loginRoute');
    }

    expect(controller.tryConsume('1.1.1.1:/auth/login', 'loginRoute')).toBe(false);
    expect(controller.tryConsume('2.2.2.2:/auth/login', 'loginRoute')).toBe(true);
    expect(controller.tryConsume('1.1.1.1:/auth/refresh', 'default')).toBe(true);
  });

  it('should admit exactly capacity requests when they race on a fresh key', async () => {
    const results = await Promise.all(
      Array.from({ length: 20 }, () =>
        Promise.resolve().then(() => controller.tryConsume('race', 'loginRoute')),
      ),
    );

    expect(results.filter(Boolean)).toHaveLength(5);
    expect(store.size).toBe(1);
  });

  it('should raise RateLimitExceeded with login details from consume', () => {
    for (let i = 0; i < 5; i++) {
      controller.consume('k', 'loginRoute');
    }

    let caught: unknown;
    try {
      controller.consume('k', 'loginRoute');
    } catch (error) {
      caught = error;
    }

    expect(isTollgateError(caught, ErrorCode.RateLimitExceeded)).toBe(true);
    expect(caught instanceof TollgateError && caught.details).toEqual({
      retry_after: 900,
      remaining: 0,
      max_attempts: 5,
    });
  });

  it('should leave max_attempts out for the default policy', () => {
    const tight = new AdmissionControllerService(
      store,
      {
        ...options,
        policies: {
          ...options.policies,
          default: { name: 'default', capacity: 1, refillTokens: 1, refillSeconds: 60 },
        },
      },
      clock,
    );
    tight.consume('k');

    let caught: unknown;
    try {
      tight.consume('k');
    } catch (error) {
      caught = error;
    }

    expect(caught instanceof TollgateError && caught.details).toEqual({
      retry_after: 60,
      remaining: 0,
    });
  });

  it('should report a full bucket for an unseen key without creating it', () => {
    expect(controller.getInfo('unseen', 'loginRoute')).toEqual({
      availableTokens: 5,
      waitSeconds: 0,
      capacity: 5,
    });
    expect(store.size).toBe(0);
  });

  it('should report the wait for an empty bucket', () => {
    for (let i = 0; i < 5; i++) {
      controller.check('k', 'loginRoute');
    }
    clock.advanceSeconds(60);

    expect(controller.getInfo('k', 'loginRoute')).toEqual({
      availableTokens: 0,
      waitSeconds: 840,
      capacity: 5,
    });
  });

  it('should reject invalid costs', () => {
    expect(() => controller.check('k', 'loginRoute', 0)).toThrow(RangeError);
    expect(() => controller.check('k', 'loginRoute', 6)).toThrow(RangeError);
    expect(() => controller.check('k', 'loginRoute', 1.5)).toThrow(RangeError);
    expect(store.size).toBe(0);
  });

  it('should start over after a bucket is removed', () => {
    for (let i = 0; i < 5; i++) {
      controller.check('k', 'loginRoute');
    }

    expect(controller.removeBucket('k')).toBe(true);
    expect(controller.removeBucket('k')).toBe(false);
    expect(controller.tryConsume('k', 'loginRoute')).toBe(true);
  });

  it('should clear every bucket', () => {
    controller.check('a');
    controller.check('b');

    expect(controller.clearAllBuckets()).toBe(2);
    expect(store.size).toBe(0);
  });
});
