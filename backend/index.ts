import 'dotenv/config';

import { ImpactCalculator } from './analysis/ImpactCalculator';
import { ResolutionCache } from './cache/ResolutionCache';
import { loadEngineConfig, type EngineConfig } from './config/EngineConfig';
import { EdgeStore } from './graph/EdgeStore';
import type { EntityLookup } from './graph/EntityDirectory';
import { GraphQueries } from './graph/GraphQueries';
import { SeededRandom, seedFromClock, type RandomSource } from './random/SeededRandom';
import { Telemetry } from './telemetry/Telemetry';
import { TelemetryStore } from './telemetry/TelemetryStore';
import type { FlowDirectory } from './trace/FlowDirectory';
import { TraceSynthesizer } from './trace/TraceSynthesizer';

export type EngineOptions = {
  config?: Partial<EngineConfig>;
  entities?: EntityLookup;
  flows?: FlowDirectory;
  /** Overrides the seeded generator built from `config.traceSeed`. */
  random?: RandomSource;
  /** Epoch milliseconds, shared by the cache TTL and the trace start instant. */
  now?: () => number;
  telemetry?: Telemetry;
};

export type Engine = {
  config: EngineConfig;
  seed: number | null;
  telemetry: Telemetry;
  edges: EdgeStore;
  queries: GraphQueries;
  impact: ImpactCalculator;
  resolver: ResolutionCache;
  traces: TraceSynthesizer;
};

/**
 * Composition root: one EdgeStore shared by the graph components, plus an
 * independent TraceSynthesizer. Settings come from the environment (and a
 * local `.env`), overridden by `options.config`.
 */
export function createEngine(options: EngineOptions = {}): Engine {
  const config: EngineConfig = { ...loadEngineConfig(), ...options.config };
  const now = options.now ?? Date.now;

  const telemetry =
    options.telemetry ??
    new Telemetry({
      store: new TelemetryStore({ maxEvents: config.telemetryMaxEvents }),
      enabled: config.telemetryEnabled,
      structuredLogs: config.telemetryStructuredLogs,
    });

  const edges = new EdgeStore({ telemetry, now: () => new Date(now()) });
  const queries = new GraphQueries({ store: edges, entities: options.entities, telemetry });

  const seed = options.random ? null : config.traceSeed ?? seedFromClock(now());
  const random = options.random ?? new SeededRandom(seed ?? 0);

  return {
    config,
    seed,
    telemetry,
    edges,
    queries,
    impact: new ImpactCalculator(queries),
    resolver: new ResolutionCache(queries, {
      ttlSeconds: config.cacheTtlSeconds,
      maxEntries: config.cacheMaxEntries,
      now,
      telemetry,
    }),
    traces: new TraceSynthesizer({
      random,
      now,
      flows: options.flows,
      telemetry,
    }),
  };
}

export { loadEngineConfig, DEFAULT_ENGINE_CONFIG } from './config/EngineConfig';
export type { EngineConfig } from './config/EngineConfig';
export { EdgeStore, CYCLE_CHECK_MAX_DEPTH } from './graph/EdgeStore';
export {
  GraphQueries,
  HEALTH_CASCADE_MAX_DEPTH,
  TRANSITIVE_MAX_DEPTH,
} from './graph/GraphQueries';
export type {
  CascadeAction,
  DirectDependencies,
  HealthCascadeEntry,
  FailureSimulation,
  ServiceContext,
} from './graph/GraphQueries';
export * from './graph/DependencyEdge';
export * from './graph/EntityDirectory';
export { FifoQueue } from './graph/FifoQueue';
export { ImpactCalculator } from './analysis/ImpactCalculator';
export { classifyFailureSeverity, recommendationsFor } from './analysis/ImpactSeverity';
export { ResolutionCache } from './cache/ResolutionCache';
export type { ResolutionMode, ResolutionStats } from './cache/ResolutionCache';
export { SeededRandom, type RandomSource } from './random/SeededRandom';
export { TraceSynthesizer } from './trace/TraceSynthesizer';
export type { ExecuteFlowRequest, BatchExecution } from './trace/TraceSynthesizer';
export * from './trace/FlowDirectory';
export type * from './trace/Span';
export { toOtelSpan, toJaegerSpan } from './trace/SpanSerialization';
export { parseOtelTrace } from './trace/TraceSchemas';
export { DomainError, isDomainError, asDomainError } from './reliability/DomainError';
export { reportFailure, type FailureReport } from './reliability/FailureHandling';
export { Telemetry, telemetry } from './telemetry/Telemetry';
export { TelemetryStore } from './telemetry/TelemetryStore';
