import { composeHopTiming, latencyBandFor, simulateLatency } from '../LatencyModel';
import { ScriptedRandom } from './ScriptedRandom';

describe('simulateLatency', () => {
  test('draws from the service type band', () => {
    const random = new ScriptedRandom([0.5, 0.9]);
    expect(simulateLatency(random, 'rest', false)).toBe(77.5);
    expect(random.consumed).toBe(2);
  });

  test('multiplies failing hops by the error factor', () => {
    expect(simulateLatency(new ScriptedRandom([0.5, 0.5, 0.9]), 'rest', true)).toBe(465);
  });

  test('applies a spike when the roll is under 5%', () => {
    expect(simulateLatency(new ScriptedRandom([0, 0.01, 0.5]), 'grpc', false)).toBe(5.5);
  });

  test('unknown service types use the default band', () => {
    expect(latencyBandFor('soap')).toEqual({ minMs: 5, maxMs: 100 });
    expect(simulateLatency(new ScriptedRandom([0.5, 0.9]), 'soap', false)).toBe(52.5);
  });
});

describe('composeHopTiming', () => {
  test('subtracts the network delay both ways', () => {
    expect(composeHopTiming(new ScriptedRandom([0]), 10)).toEqual({
      latencyMs: 10,
      networkDelayMs: 0.5,
      serverDurationMs: 9,
    });
  });

  test('clamps server processing to 1ms', () => {
    expect(composeHopTiming(new ScriptedRandom([1]), 10)).toEqual({
      latencyMs: 10,
      networkDelayMs: 5,
      serverDurationMs: 1,
    });
  });

  test('keeps the server inside very short hops', () => {
    expect(composeHopTiming(new ScriptedRandom([0.5]), 1.5)).toEqual({
      latencyMs: 1.5,
      networkDelayMs: 0.75,
      serverDurationMs: 0.75,
    });
    expect(composeHopTiming(new ScriptedRandom([0.5]), 2.5)).toEqual({
      latencyMs: 2.5,
      networkDelayMs: 1.25,
      serverDurationMs: 1,
    });
  });
});
