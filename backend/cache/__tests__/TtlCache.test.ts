import { TtlCache } from '../TtlCache';

const makeClock = (start = 0) => {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
};

describe('TtlCache', () => {
  test('rejects non-positive limits', () => {
    expect(() => new TtlCache({ ttlMs: 0, maxEntries: 1 })).toThrow('ttlMs must be > 0');
    expect(() => new TtlCache({ ttlMs: 1, maxEntries: 0 })).toThrow(
      'maxEntries must be > 0',
    );
  });

  test('expires entries once the ttl has fully elapsed', () => {
    const clock = makeClock(1_000);
    const cache = new TtlCache<string>({ ttlMs: 100, maxEntries: 10, now: clock.now });
    cache.set('k', 'v');

    clock.advance(99);
    expect(cache.get('k')).toBe('v');

    clock.advance(1);
    expect(cache.get('k')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  test('evicts the oldest write when full', () => {
    const cache = new TtlCache<number>({ ttlMs: 1_000, maxEntries: 2 });
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 3);
    cache.set('c', 4);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(3);
    expect(cache.get('c')).toBe(4);
  });

  test('deletes by prefix', () => {
    const cache = new TtlCache<number>({ ttlMs: 1_000, maxEntries: 10 });
    cache.set('A:direct', 1);
    cache.set('A:full', 2);
    cache.set('AB:direct', 3);

    expect(cache.deleteByPrefix('A:')).toBe(2);
    expect(cache.get('AB:direct')).toBe(3);
    expect(cache.size).toBe(1);
  });
});
