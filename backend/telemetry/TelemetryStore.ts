type Numeric = number;

export type TelemetryTags = Record<
  string,
  string | number | boolean | null | undefined
>;

export type TelemetryEvent = {
  ts: string;
  name: string;
  durationMs?: number;
  tags?: TelemetryTags;
  metrics?: Record<string, Numeric | null | undefined>;
  message?: string;
};

const nowIso = () => new Date().toISOString();

/** Keeps the most recent events; the oldest go first once `maxEvents` is reached. */
export class TelemetryStore {
  private readonly maxEvents: number;
  private readonly events: TelemetryEvent[] = [];

  constructor(args?: { maxEvents?: number }) {
    this.maxEvents = Math.max(100, Math.trunc(args?.maxEvents ?? 2000));
  }

  reset(): void {
    this.events.length = 0;
  }

  record(event: Omit<TelemetryEvent, 'ts'> & { ts?: string }): TelemetryEvent {
    const e: TelemetryEvent = { ...event, ts: event.ts ?? nowIso() };

    this.events.push(e);
    if (this.events.length > this.maxEvents)
      this.events.splice(0, this.events.length - this.maxEvents);

    return e;
  }

  listRecent(limit = 200): readonly TelemetryEvent[] {
    const n = Math.max(0, Math.trunc(limit));
    if (n === 0) return [];
    return this.events.slice(Math.max(0, this.events.length - n));
  }

  countByName(name: string): number {
    return this.events.filter((e) => e.name === name).length;
  }
}
