import { InMemoryBucketStore } from './in-memory-bucket-store';
import { BucketState } from './rate-limit.types';

function bucket(available: number): BucketState {
  return { capacity: 5, refillTokens: 5, refillMs: 1000, available, lastRefillAt: 0 };
}

function touch(store: InMemoryBucketStore, key: string, available = 0) {
  store.compute(key, () => bucket(available), (current) => [current, undefined]);
}

describe('InMemoryBucketStore', () => {
  it('should create a bucket only once per key', () => {
    const store = new InMemoryBucketStore({ maxBuckets: 10 });
    const create = jest.fn(() => bucket(5));

    store.compute('a', create, (current) => [{ ...current, available: current.available - 1 }, null]);
    store.compute('a', create, (current) => [{ ...current, available: current.available - 1 }, null]);

    expect(create).toHaveBeenCalledTimes(1);
    expect(store.peek('a')?.available).toBe(3);
  });

  it('should return the result of the update function', () => {
    const store = new InMemoryBucketStore({ maxBuckets: 10 });

    const result = store.compute('a', () => bucket(5), (current) => [current, current.available * 2]);

    expect(result).toBe(10);
  });

  it('should keep the previous state when the update function throws', () => {
    const store = new InMemoryBucketStore({ maxBuckets: 10 });
    touch(store, 'a', 2);

    expect(() =>
      store.compute('a', () => bucket(5), () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(store.peek('a')?.available).toBe(2);
  });

  it('should evict the least recently used bucket when full', () => {
    const store = new InMemoryBucketStore({ maxBuckets: 3 });
    touch(store, 'a');
    touch(store, 'b');
    touch(store, 'c');
    touch(store, 'a');

    touch(store, 'd');

    expect(store.size).toBe(3);
    expect(store.peek('b')).toBeUndefined();
    expect(store.peek('a')).toBeDefined();
    expect(store.peek('c')).toBeDefined();
    expect(store.peek('d')).toBeDefined();
  });

  it('should reclaim full buckets before evicting used ones', () => {
    const store = new InMemoryBucketStore({
      maxBuckets: 3,
      isReclaimable: (state) => state.available === state.capacity,
    });
    touch(store, 'a', 0);
    touch(store, 'b', 5);
    touch(store, 'c', 0);

    touch(store, 'd', 0);

    expect(store.peek('b')).toBeUndefined();
    expect(store.peek('a')).toBeDefined();
    expect(store.size).toBe(3);
  });

  it('should sweep for reclaimable buckets once per batch of inserts at capacity', () => {
    const isReclaimable = jest.fn(() => false);
    const store = new InMemoryBucketStore({ maxBuckets: 100, isReclaimable });
    for (let i = 0; i < 100; i++) {
      touch(store, `full-${i}`);
    }

    for (let i = 0; i < 10; i++) {
      touch(store, `new-${i}`);
    }

    expect(isReclaimable).toHaveBeenCalledTimes(100);
    expect(store.size).toBe(100);
    expect(store.peek('full-9')).toBeUndefined();
    expect(store.peek('full-10')).toBeDefined();
    expect(store.peek('new-9')).toBeDefined();
  });

  it('should not count peek as a use', () => {
    const store = new InMemoryBucketStore({ maxBuckets: 2 });
    touch(store, 'a');
    touch(store, 'b');
    store.peek('a');

    touch(store, 'c');

    expect(store.peek('a')).toBeUndefined();
  });

  it('should delete and clear buckets', () => {
    const store = new InMemoryBucketStore({ maxBuckets: 10 });
    touch(store, 'a');
    touch(store, 'b');

    expect(store.delete('a')).toBe(true);
    expect(store.delete('a')).toBe(false);
    expect(store.clear()).toBe(1);
    expect(store.size).toBe(0);
  });

  it('should reject a non-positive maxBuckets', () => {
    expect(() => new InMemoryBucketStore({ maxBuckets: 0 })).toThrow('Invalid maxBuckets: 0');
  });
});
