import { createEngine } from '../index';
import { SeededRandom } from '../random/SeededRandom';
import type { ExecuteFlowRequest } from '../trace/TraceSynthesizer';

const NOW_MS = 1_700_000_000_000;

const request: ExecuteFlowRequest = {
  flow: { id: 'f-1', name: 'Signup' },
  steps: [
    { stepNumber: 1, fromServiceId: 'web', toServiceId: 'auth' },
    { stepNumber: 2, fromServiceId: 'auth', toServiceId: 'users' },
  ],
  services: {
    web: { name: 'web-frontend', serviceType: 'rest' },
    auth: { name: 'auth-service', serviceType: 'grpc' },
    users: { name: 'user-store', serviceType: 'rest' },
  },
  injectFailure: true,
};

const quiet = { telemetryStructuredLogs: false };

describe('createEngine', () => {
  test('shares one edge store across the graph components', () => {
    const engine = createEngine({ config: quiet, now: () => NOW_MS });

    engine.edges.addEdge({ sourceId: 'web', targetId: 'auth', severity: 'critical' });
    engine.edges.addEdge({ sourceId: 'auth', targetId: 'users', severity: 'high' });

    expect(engine.queries.getTransitiveDependencies('web')).toHaveLength(2);
    expect(engine.resolver.resolve('users', 'blast-radius').blastRadius).toBe(2);
    expect(engine.impact.simulateFailure('users').simulation.totalImpact).toBe(2);
    expect(engine.telemetry.store.countByName('graph.edge.added')).toBe(2);
  });

  test('a configured seed reproduces traces across engines', () => {
    const a = createEngine({ config: { ...quiet, traceSeed: 42 }, now: () => NOW_MS });
    const b = createEngine({ config: { ...quiet, traceSeed: 42 }, now: () => NOW_MS });

    expect(a.seed).toBe(42);
    expect(a.traces.execute(request)).toEqual(b.traces.execute(request));
  });

  test('derives the seed from the clock when none is configured', () => {
    const engine = createEngine({ config: { ...quiet, traceSeed: null }, now: () => NOW_MS });
    expect(engine.seed).toBe(NOW_MS >>> 0);
  });

  test('an injected random source takes precedence over the seed', () => {
    const engine = createEngine({
      config: { ...quiet, traceSeed: 42 },
      random: new SeededRandom(42),
      now: () => NOW_MS,
    });

    expect(engine.seed).toBeNull();
    expect(engine.traces.execute(request).traceId).toBe(
      createEngine({ config: { ...quiet, traceSeed: 42 }, now: () => NOW_MS }).traces.execute(
        request,
      ).traceId,
    );
  });

  test('applies the cache settings from config', () => {
    let t = 0;
    const engine = createEngine({
      config: { ...quiet, cacheTtlSeconds: 1 },
      now: () => t,
    });

    engine.resolver.resolve('x');
    t = 1_000;
    engine.resolver.resolve('x');

    expect(engine.resolver.stats.totalResolutions).toBe(2);
  });
});
