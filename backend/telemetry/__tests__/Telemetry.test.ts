import { Telemetry } from '../Telemetry';
import { TelemetryStore } from '../TelemetryStore';

describe('TelemetryStore', () => {
  test('keeps at most maxEvents, dropping the oldest', () => {
    const store = new TelemetryStore({ maxEvents: 100 });
    for (let i = 0; i < 150; i += 1) store.record({ name: `e${i}` });

    const events = store.listRecent(1_000);
    expect(events).toHaveLength(100);
    expect(events[0].name).toBe('e50');
    expect(store.listRecent(0)).toEqual([]);
  });

  test('never goes below 100 retained events', () => {
    const store = new TelemetryStore({ maxEvents: 5 });
    for (let i = 0; i < 20; i += 1) store.record({ name: 'x' });
    expect(store.countByName('x')).toBe(20);
  });

  test('reset drops every retained event', () => {
    const store = new TelemetryStore();
    store.record({ name: 'a', durationMs: 5 });
    store.record({ name: 'a', metrics: { size: 4 } });

    store.reset();

    expect(store.countByName('a')).toBe(0);
    expect(store.listRecent()).toEqual([]);
  });
});

describe('Telemetry', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('drops events when disabled', () => {
    const telemetry = new Telemetry({ enabled: false });
    telemetry.record({ name: 'ignored' });
    expect(telemetry.store.countByName('ignored')).toBe(0);
  });

  test('writes one JSON line per event when structured logs are on', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const telemetry = new Telemetry({ structuredLogs: true });

    telemetry.record({ name: 'graph.query', durationMs: 2, tags: { op: 'test' } });

    expect(info).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(info.mock.calls[0][0]))).toMatchObject({
      type: 'archmap.telemetry',
      name: 'graph.query',
      durationMs: 2,
      tags: { op: 'test' },
    });
  });

  test('reads the log switch from the environment by default', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const telemetry = new Telemetry();

    // The test setup sets ARCHMAP_TELEMETRY_LOGS=0.
    telemetry.record({ name: 'quiet' });

    expect(telemetry.logsEnabled()).toBe(false);
    expect(info).not.toHaveBeenCalled();
    expect(telemetry.store.countByName('quiet')).toBe(1);
  });

  test('time() returns the result and records its description', () => {
    const telemetry = new Telemetry({ structuredLogs: false });

    const value = telemetry.time(
      'work',
      () => [1, 2, 3],
      (result) => ({ metrics: { count: result.length } }),
    );

    expect(value).toEqual([1, 2, 3]);
    const [event] = telemetry.store.listRecent();
    expect(event.name).toBe('work');
    expect(event.metrics).toEqual({ count: 3 });
    expect(event.durationMs).toBeGreaterThanOrEqual(0);
  });
});
