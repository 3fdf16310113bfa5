import { ResolutionCache } from '../ResolutionCache';
import { EdgeStore } from '../../graph/EdgeStore';
import { GraphQueries } from '../../graph/GraphQueries';
import { Telemetry } from '../../telemetry/Telemetry';

const setup = (options: { ttlSeconds?: number; maxEntries?: number } = {}) => {
  let t = 0;
  const telemetry = new Telemetry({ structuredLogs: false });
  const store = new EdgeStore({ telemetry });
  const queries = new GraphQueries({ store, telemetry });
  const cache = new ResolutionCache(queries, {
    ...options,
    now: () => t,
    telemetry,
  });
  return {
    store,
    cache,
    telemetry,
    setTime: (ms: number) => {
      t = ms;
    },
  };
};

describe('ResolutionCache', () => {
  test('reports a zero hit rate before any resolution', () => {
    const { cache } = setup();
    expect(cache.stats).toEqual({
      totalResolutions: 0,
      cacheHits: 0,
      cacheSize: 0,
      hitRate: 0,
    });
  });

  test('serves the second identical resolution from the cache', () => {
    const { store, cache } = setup();
    store.addEdge({ sourceId: 'A', targetId: 'B' });

    const first = cache.resolve('A');
    const second = cache.resolve('A', 'direct');

    expect(second).toBe(first);
    expect(first.downstream.map((e) => e.targetId)).toEqual(['B']);
    expect(cache.stats).toEqual({
      totalResolutions: 1,
      cacheHits: 1,
      cacheSize: 1,
      hitRate: 0.5,
    });
  });

  test('caches each mode under its own key', () => {
    const { store, cache } = setup();
    store.addEdge({ sourceId: 'A', targetId: 'B' });
    store.addEdge({ sourceId: 'B', targetId: 'C' });
    store.addEdge({ sourceId: 'X', targetId: 'A' });

    const transitive = cache.resolve('A', 'transitive');
    const blast = cache.resolve('A', 'blast-radius');
    const full = cache.resolve('A', 'full');

    expect(transitive.transitiveDependencies.map((d) => d.targetId)).toEqual(['B', 'C']);
    expect(blast.affected.map((a) => a.id)).toEqual(['X']);
    expect(full.upstream.map((r) => r.entity.id)).toEqual(['X']);
    expect(cache.stats.cacheSize).toBe(3);
  });

  test('recomputes once the default 60s ttl has elapsed', () => {
    const { cache, setTime } = setup();

    cache.resolve('A');
    setTime(59_999);
    cache.resolve('A');
    setTime(60_000);
    cache.resolve('A');

    expect(cache.stats.totalResolutions).toBe(2);
    expect(cache.stats.cacheHits).toBe(1);
  });

  test('returns stale results until the id is invalidated', () => {
    const { store, cache } = setup();
    store.addEdge({ sourceId: 'A', targetId: 'B' });
    cache.resolve('A');

    store.addEdge({ sourceId: 'A', targetId: 'C' });
    expect(cache.resolve('A').downstream).toHaveLength(1);

    expect(cache.invalidate('A')).toBe(1);
    expect(cache.resolve('A').downstream).toHaveLength(2);
  });

  test('invalidation only matches the exact id prefix', () => {
    const { cache } = setup();
    cache.resolve('A');
    cache.resolve('A', 'full');
    cache.resolve('AB');

    expect(cache.invalidate('A')).toBe(2);
    expect(cache.stats.cacheSize).toBe(1);

    cache.invalidateAll();
    expect(cache.stats.cacheSize).toBe(0);
  });

  test('honours a custom ttl and entry bound', () => {
    const { cache, setTime } = setup({ ttlSeconds: 1, maxEntries: 2 });

    cache.resolve('A');
    cache.resolve('B');
    cache.resolve('C');
    expect(cache.stats.cacheSize).toBe(2);

    cache.resolve('A');
    expect(cache.stats.cacheHits).toBe(0);

    setTime(1_000);
    cache.resolve('C');
    expect(cache.stats.cacheHits).toBe(0);
    expect(cache.stats.totalResolutions).toBe(5);
  });

  test('records resolve events tagged with mode and hit flag', () => {
    const { cache, telemetry } = setup();
    cache.resolve('A', 'full');
    cache.resolve('A', 'full');

    const events = telemetry.store
      .listRecent()
      .filter((e) => e.name === 'cache.resolve')
      .map((e) => e.tags);

    expect(events).toEqual([
      { mode: 'full', cached: false },
      { mode: 'full', cached: true },
    ]);
  });
});
