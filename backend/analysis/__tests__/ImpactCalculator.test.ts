import { ImpactCalculator } from '../ImpactCalculator';
import {
  RECOMMENDATIONS,
  classifyFailureSeverity,
  recommendationsFor,
} from '../ImpactSeverity';
import { EdgeStore } from '../../graph/EdgeStore';
import { InMemoryEntityDirectory } from '../../graph/EntityDirectory';
import { GraphQueries } from '../../graph/GraphQueries';
import { Telemetry } from '../../telemetry/Telemetry';

const makeCalculator = (entities = new InMemoryEntityDirectory()) => {
  const telemetry = new Telemetry({ structuredLogs: false });
  const store = new EdgeStore({ telemetry });
  const calculator = new ImpactCalculator(new GraphQueries({ store, entities, telemetry }));
  return { store, calculator };
};

describe('classifyFailureSeverity', () => {
  test.each([
    [0, 'low'],
    [1, 'low'],
    [2, 'medium'],
    [4, 'medium'],
    [5, 'high'],
    [9, 'high'],
    [10, 'critical'],
    [42, 'critical'],
  ])('%i impacted -> %s', (total, expected) => {
    expect(classifyFailureSeverity(total)).toBe(expected);
  });
});

describe('recommendationsFor', () => {
  test('uses strict thresholds', () => {
    expect(
      recommendationsFor({ blastRadius: 5, upstreamCount: 5, downstreamCount: 3 }),
    ).toEqual([RECOMMENDATIONS.noConcerns]);
    expect(
      recommendationsFor({ blastRadius: 6, upstreamCount: 0, downstreamCount: 0 }),
    ).toEqual([RECOMMENDATIONS.degradedMode]);
  });
});

describe('ImpactCalculator', () => {
  test('a hub with many dependents gets every recommendation in order', () => {
    const { store, calculator } = makeCalculator();
    for (let i = 0; i < 11; i += 1) store.addEdge({ sourceId: `u${i}`, targetId: 'hub' });
    for (let i = 0; i < 4; i += 1) store.addEdge({ sourceId: 'hub', targetId: `d${i}` });

    const report = calculator.calculateBlastRadius('hub');

    expect(report.blastRadius).toBe(11);
    expect(report.context.upstream).toHaveLength(11);
    expect(report.context.downstream).toHaveLength(4);
    expect(report.recommendations).toEqual([
      RECOMMENDATIONS.circuitBreakers,
      RECOMMENDATIONS.degradedMode,
      RECOMMENDATIONS.splitService,
      RECOMMENDATIONS.bulkhead,
    ]);
  });

  test('an isolated service has no concerns', () => {
    const { calculator } = makeCalculator();

    const report = calculator.calculateBlastRadius('alone');

    expect(report.blastRadius).toBe(0);
    expect(report.recommendations).toEqual([RECOMMENDATIONS.noConcerns]);
  });

  test('classifies a simulated failure by its impact count', () => {
    const { store, calculator } = makeCalculator();
    store.addEdge({ sourceId: 'B', targetId: 'A', severity: 'critical' });
    store.addEdge({ sourceId: 'C', targetId: 'A', severity: 'high' });
    store.addEdge({ sourceId: 'D', targetId: 'C', severity: 'critical' });
    store.addEdge({ sourceId: 'E', targetId: 'A', severity: 'low' });

    const result = calculator.simulateFailure('A');

    expect(result.simulation.totalImpact).toBe(3);
    expect(result.severity).toBe('medium');
  });

  test('attaches the health cascade of already failing services', () => {
    const { store, calculator } = makeCalculator(
      new InMemoryEntityDirectory([
        { type: 'service', id: 'cache', name: 'Cache', healthStatus: 'degraded' },
        { type: 'service', id: 'web', name: 'Web', criticality: 'critical' },
      ]),
    );
    store.addEdge({ sourceId: 'web', targetId: 'cache' });
    store.addEdge({ sourceId: 'web', targetId: 'auth', severity: 'critical' });

    const result = calculator.simulateFailure('auth');

    expect(result.simulation.affected.map((a) => a.id)).toEqual(['web']);
    expect(result.cascadeEffects).toEqual([
      {
        failingService: { id: 'cache', name: 'Cache', healthStatus: 'degraded' },
        affectedService: { id: 'web', name: 'Web', criticality: 'critical' },
        hopsToFailure: 1,
        action: 'ALERT',
      },
    ]);
  });
});
