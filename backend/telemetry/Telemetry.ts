import { performance } from 'node:perf_hooks';

import { TelemetryStore, type TelemetryEvent } from './TelemetryStore';

const envFlag = (name: string): string => String(process.env[name] ?? '').trim();

const flagEnabled = (name: string): boolean => {
  const v = envFlag(name).toLowerCase();
  if (!v) return true;
  return v === '1' || v === 'true' || v === 'yes';
};

export type TelemetryOptions = {
  store?: TelemetryStore;
  /** Overrides `ARCHMAP_TELEMETRY`. */
  enabled?: boolean;
  /** Overrides `ARCHMAP_TELEMETRY_LOGS`. */
  structuredLogs?: boolean;
};

export type TelemetryInput = Omit<TelemetryEvent, 'ts'> & { ts?: string };

export class Telemetry {
  readonly store: TelemetryStore;
  private readonly enabled?: boolean;
  private readonly structuredLogs?: boolean;

  constructor(options: TelemetryOptions = {}) {
    this.store = options.store ?? new TelemetryStore();
    this.enabled = options.enabled;
    this.structuredLogs = options.structuredLogs;
  }

  nowMs(): number {
    return performance.now();
  }

  isEnabled(): boolean {
    return this.enabled ?? flagEnabled('ARCHMAP_TELEMETRY');
  }

  logsEnabled(): boolean {
    return this.structuredLogs ?? flagEnabled('ARCHMAP_TELEMETRY_LOGS');
  }

  record(event: TelemetryInput): void {
    if (!this.isEnabled()) return;

    const recorded = this.store.record(event);

    if (this.logsEnabled()) {
      // Structured, one-line JSON logs.
      // eslint-disable-next-line no-console
      console.info(
        JSON.stringify({
          type: 'archmap.telemetry',
          ts: recorded.ts,
          name: recorded.name,
          durationMs: recorded.durationMs,
          tags: recorded.tags,
          metrics: recorded.metrics,
          message: recorded.message,
        }),
      );
    }
  }

  /** Runs `fn`, recording its duration under `name`. */
  time<T>(
    name: string,
    fn: () => T,
    describe?: (result: T) => Pick<TelemetryEvent, 'tags' | 'metrics'>,
  ): T {
    const startedAtMs = this.nowMs();
    const result = fn();
    this.record({
      name,
      durationMs: this.nowMs() - startedAtMs,
      ...(describe ? describe(result) : {}),
    });
    return result;
  }
}

// Process-wide default; components accept their own instance.
export const telemetry = new Telemetry();
