import type {
  BlastRadiusResult,
  TransitiveDependency,
} from '../graph/DependencyEdge';
import type {
  DirectDependencies,
  GraphQueries,
  ServiceContext,
} from '../graph/GraphQueries';
import { telemetry as defaultTelemetry, type Telemetry } from '../telemetry/Telemetry';
import { CACHE_POLICY } from './CachePolicy';
import { TtlCache } from './TtlCache';

export type ResolutionMode = 'direct' | 'transitive' | 'blast-radius' | 'full';

export type TransitiveResolution = {
  id: string;
  transitiveDependencies: TransitiveDependency[];
};

export type ResolutionResult = {
  direct: DirectDependencies;
  transitive: TransitiveResolution;
  'blast-radius': BlastRadiusResult;
  full: ServiceContext;
};

export type ResolutionStats = {
  totalResolutions: number;
  cacheHits: number;
  cacheSize: number;
  hitRate: number;
};

export type ResolutionCacheOptions = {
  ttlSeconds?: number;
  maxEntries?: number;
  /** Epoch milliseconds. */
  now?: () => number;
  telemetry?: Telemetry;
};

type AnyResolution = ResolutionResult[ResolutionMode];

/**
 * TTL memoization in front of GraphQueries, keyed `"{id}:{mode}"`.
 *
 * Nothing is invalidated automatically: callers that add edges must call
 * `invalidate` for the affected ids (or `invalidateAll`).
 */
export class ResolutionCache {
  private readonly queries: GraphQueries;
  private readonly cache: TtlCache<AnyResolution>;
  private readonly telemetry: Telemetry;
  private resolutionCount = 0;
  private cacheHits = 0;

  constructor(queries: GraphQueries, options: ResolutionCacheOptions = {}) {
    this.queries = queries;
    this.telemetry = options.telemetry ?? defaultTelemetry;
    this.cache = new TtlCache<AnyResolution>({
      ttlMs:
        options.ttlSeconds !== undefined
          ? options.ttlSeconds * 1000
          : CACHE_POLICY.resolution.ttlMs,
      maxEntries: options.maxEntries ?? CACHE_POLICY.resolution.maxEntries,
      now: options.now,
    });
  }

  resolve<M extends ResolutionMode>(id: string, mode: M): ResolutionResult[M];
  resolve(id: string): DirectDependencies;
  resolve(id: string, mode: ResolutionMode = 'direct'): AnyResolution {
    const key = `${id}:${mode}`;
    const startedAtMs = this.telemetry.nowMs();

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.cacheHits += 1;
      this.recordResolve(mode, true, startedAtMs);
      return cached;
    }

    this.resolutionCount += 1;
    const value = this.compute(id, mode);
    this.cache.set(key, value);
    this.recordResolve(mode, false, startedAtMs);
    return value;
  }

  /** Drops every cached mode for `id`; returns how many entries were removed. */
  invalidate(id: string): number {
    const removed = this.cache.deleteByPrefix(`${id}:`);
    this.telemetry.record({
      name: 'cache.invalidate',
      tags: { id },
      metrics: { removed },
    });
    return removed;
  }

  invalidateAll(): void {
    const removed = this.cache.size;
    this.cache.clear();
    this.telemetry.record({
      name: 'cache.invalidate',
      tags: { id: '*' },
      metrics: { removed },
    });
  }

  get stats(): ResolutionStats {
    return {
      totalResolutions: this.resolutionCount,
      cacheHits: this.cacheHits,
      cacheSize: this.cache.size,
      hitRate:
        this.cacheHits / Math.max(this.resolutionCount + this.cacheHits, 1),
    };
  }

  private compute(id: string, mode: ResolutionMode): AnyResolution {
    switch (mode) {
      case 'transitive':
        return {
          id,
          transitiveDependencies: this.queries.getTransitiveDependencies(id),
        };
      case 'blast-radius':
        return this.queries.calculateBlastRadius(id);
      case 'full':
        return this.queries.getServiceContext(id);
      case 'direct':
      default:
        return this.queries.getDirectDependencies(id);
    }
  }

  private recordResolve(mode: ResolutionMode, cached: boolean, startedAtMs: number) {
    this.telemetry.record({
      name: 'cache.resolve',
      durationMs: this.telemetry.nowMs() - startedAtMs,
      tags: { mode, cached },
    });
  }
}
