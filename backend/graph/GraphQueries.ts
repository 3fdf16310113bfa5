import { telemetry as defaultTelemetry, type Telemetry } from '../telemetry/Telemetry';
import type {
  AffectedEntity,
  BlastRadiusResult,
  DependencyEdge,
  EntityRef,
  Severity,
  TransitiveDependency,
} from './DependencyEdge';
import type { EdgeStore } from './EdgeStore';
import {
  EMPTY_ENTITY_LOOKUP,
  isEntityOfType,
  nameOf,
  type Criticality,
  type Entity,
  type HealthStatus,
  type EntityLookup,
  type PlatformEntity,
} from './EntityDirectory';
import { FifoQueue } from './FifoQueue';

export const TRANSITIVE_MAX_DEPTH = 10;
export const FAILURE_SIMULATION_MAX_DEPTH = 10;
export const HEALTH_CASCADE_MAX_DEPTH = 5;

/** A dependent's own edge must carry one of these to propagate a failure. */
const PROPAGATING_SEVERITIES: ReadonlySet<Severity> = new Set<Severity>([
  'critical',
  'high',
]);

export type DirectDependencies = {
  id: string;
  /** Edges pointing at `id` (who depends on it). */
  upstream: DependencyEdge[];
  /** Edges leaving `id` (what it depends on). */
  downstream: DependencyEdge[];
};

export type RelatedEntity = {
  entity: EntityRef & { name: string };
  dependencyType: string;
  severity: Severity;
};

export type ServiceContext = {
  id: string;
  entity: Entity | null;
  platform: PlatformEntity | null;
  upstream: RelatedEntity[];
  downstream: RelatedEntity[];
};

export type FailureImpact = {
  id: string;
  type: string;
  name: string;
  hops: number;
  /** Edge severities from the dependent towards the failed node. */
  severityChain: Severity[];
};

export type FailureSimulation = {
  failed: { id: string; name: string };
  totalImpact: number;
  affected: FailureImpact[];
};

export type CascadeAction = 'ALERT' | 'WARN' | 'MONITOR';

export type HealthCascadeEntry = {
  failingService: { id: string; name: string; healthStatus: HealthStatus };
  affectedService: { id: string; name: string; criticality: Criticality | null };
  hopsToFailure: number;
  action: CascadeAction;
};

const FAILING_HEALTH: ReadonlySet<HealthStatus> = new Set<HealthStatus>([
  'unhealthy',
  'degraded',
]);

const ACTION_RANK: Record<CascadeAction, number> = { ALERT: 0, WARN: 1, MONITOR: 2 };

const actionFor = (criticality: Criticality | null): CascadeAction => {
  if (criticality === 'critical') return 'ALERT';
  if (criticality === 'high') return 'WARN';
  return 'MONITOR';
};

type QueueEntry = [id: string, depth: number];

/**
 * Read-side graph algorithms over an EdgeStore.
 *
 * All traversals are breadth-first over a FIFO queue and mark nodes visited
 * when they are dequeued. Unknown ids produce empty results.
 */
export class GraphQueries {
  private readonly store: EdgeStore;
  private readonly entities: EntityLookup;
  private readonly telemetry: Telemetry;

  constructor(args: {
    store: EdgeStore;
    entities?: EntityLookup;
    telemetry?: Telemetry;
  }) {
    this.store = args.store;
    this.entities = args.entities ?? EMPTY_ENTITY_LOOKUP;
    this.telemetry = args.telemetry ?? defaultTelemetry;
  }

  getDependenciesOf(id: string): DependencyEdge[] {
    return this.store.getDependenciesOf(id);
  }

  getDependentsOf(id: string): DependencyEdge[] {
    return this.store.getDependentsOf(id);
  }

  getDirectDependencies(id: string): DirectDependencies {
    return {
      id,
      upstream: this.store.getDependentsOf(id),
      downstream: this.store.getDependenciesOf(id),
    };
  }

  /**
   * Forward BFS from `sourceId`.
   *
   * A node can be enqueued several times before its first dequeue, so the
   * same target may be reported once per discovering path. Those records are
   * kept as-is.
   */
  getTransitiveDependencies(
    sourceId: string,
    maxDepth = TRANSITIVE_MAX_DEPTH,
  ): TransitiveDependency[] {
    return this.telemetry.time(
      'graph.query',
      () => {
        const visited = new Set<string>();
        const queue = new FifoQueue<QueueEntry>([[sourceId, 0]]);
        const result: TransitiveDependency[] = [];

        for (let next = queue.dequeue(); next; next = queue.dequeue()) {
          const [current, depth] = next;
          if (visited.has(current) || depth > maxDepth) continue;
          visited.add(current);

          for (const edge of this.store.getDependenciesOf(current)) {
            result.push({ ...edge, hopsFromSource: depth + 1 });
            if (!visited.has(edge.targetId))
              queue.enqueue([edge.targetId, depth + 1]);
          }
        }

        return result;
      },
      (result) => ({
        tags: { op: 'getTransitiveDependencies' },
        metrics: { resultCount: result.length },
      }),
    );
  }

  /**
   * Reverse BFS: every entity that transitively depends on `id`, each listed
   * once at its shortest distance.
   */
  calculateBlastRadius(id: string, rootType = 'service'): BlastRadiusResult {
    return this.telemetry.time(
      'graph.query',
      () => {
        const visited = new Set<string>();
        const recorded = new Set<string>();
        const queue = new FifoQueue<QueueEntry>([[id, 0]]);
        const affected: AffectedEntity[] = [];

        for (let next = queue.dequeue(); next; next = queue.dequeue()) {
          const [current, depth] = next;
          if (visited.has(current)) continue;
          visited.add(current);

          for (const edge of this.store.getDependentsOf(current)) {
            const src = edge.sourceId;
            if (visited.has(src) || recorded.has(src)) continue;
            recorded.add(src);

            affected.push({
              id: src,
              type: edge.sourceType,
              name: nameOf(this.entities, { id: src, type: edge.sourceType }),
              severity: edge.severity,
              hopsAway: depth + 1,
            });
            queue.enqueue([src, depth + 1]);
          }
        }

        return {
          root: {
            id,
            type: rootType,
            name: nameOf(this.entities, { id, type: rootType }),
          },
          blastRadius: affected.length,
          affected,
          maxDepth: affected.reduce((max, a) => Math.max(max, a.hopsAway), 0),
        };
      },
      (result) => ({
        tags: { op: 'calculateBlastRadius' },
        metrics: { blastRadius: result.blastRadius, maxDepth: result.maxDepth },
      }),
    );
  }

  /** Edges flagged circular at insertion. No traversal. */
  detectCircularDependencies(): DependencyEdge[] {
    return this.store.getAllEdges().filter((e) => e.isCircular);
  }

  /**
   * Entity, owning platform and distinct direct neighbours of `id`.
   *
   * The platform comes from the service's `platformId`, else from the first
   * outgoing edge that targets a platform.
   */
  getServiceContext(id: string, type = 'service'): ServiceContext {
    const entity = this.entities.get(type, id);
    const downstreamEdges = this.store.getDependenciesOf(id);

    let platform: PlatformEntity | null = null;
    const platformId =
      entity && isEntityOfType(entity, 'service') ? entity.platformId : undefined;
    const platformEdge = downstreamEdges.find((e) => e.targetType === 'platform');
    const candidate = platformId ?? platformEdge?.targetId;
    if (candidate) {
      const found = this.entities.get('platform', candidate);
      if (found && isEntityOfType(found, 'platform')) platform = found;
    }

    return {
      id,
      entity,
      platform,
      upstream: this.distinctRelated(this.store.getDependentsOf(id), 'source'),
      downstream: this.distinctRelated(downstreamEdges, 'target'),
    };
  }

  /**
   * Simulates `id` going down. A dependent within 10 hops is impacted when its
   * own first edge on some path to `id` is high or critical; `hops` is the
   * shortest such path.
   */
  simulateFailure(id: string, type = 'service'): FailureSimulation {
    // Shortest reverse distance to `id` and the severities along that path.
    const reach = new Map<string, { dist: number; chain: Severity[] }>([
      [id, { dist: 0, chain: [] }],
    ]);
    const order: string[] = [];
    const queue = new FifoQueue<string>([id]);

    for (let current = queue.dequeue(); current !== undefined; current = queue.dequeue()) {
      order.push(current);
      const here = reach.get(current);
      if (!here || here.dist >= FAILURE_SIMULATION_MAX_DEPTH) continue;

      for (const edge of this.store.getDependentsOf(current)) {
        if (reach.has(edge.sourceId)) continue;
        reach.set(edge.sourceId, {
          dist: here.dist + 1,
          chain: [edge.severity, ...here.chain],
        });
        queue.enqueue(edge.sourceId);
      }
    }

    const recorded = new Set<string>([id]);
    const affected: FailureImpact[] = [];

    // `order` is sorted by distance, so the first hit per dependent is shortest.
    for (const target of order) {
      const here = reach.get(target);
      if (!here || here.dist >= FAILURE_SIMULATION_MAX_DEPTH) continue;

      for (const edge of this.store.getDependentsOf(target)) {
        if (!PROPAGATING_SEVERITIES.has(edge.severity)) continue;
        if (recorded.has(edge.sourceId)) continue;
        recorded.add(edge.sourceId);

        affected.push({
          id: edge.sourceId,
          type: edge.sourceType,
          name: nameOf(this.entities, { id: edge.sourceId, type: edge.sourceType }),
          hops: here.dist + 1,
          severityChain: [edge.severity, ...here.chain],
        });
      }
    }

    return {
      failed: { id, name: nameOf(this.entities, { id, type }) },
      totalImpact: affected.length,
      affected,
    };
  }

  /**
   * Services within 5 hops upstream of every unhealthy or degraded service,
   * with the action their own criticality calls for. Sorted by action, then
   * by distance.
   */
  getHealthCascade(): HealthCascadeEntry[] {
    const entries: HealthCascadeEntry[] = [];
    const checked = new Set<string>();

    for (const edge of this.store.getAllEdges()) {
      if (edge.targetType !== 'service' || checked.has(edge.targetId)) continue;
      checked.add(edge.targetId);

      const failing = this.entities.get('service', edge.targetId);
      if (!failing || !isEntityOfType(failing, 'service')) continue;
      const health = failing.healthStatus;
      if (!health || !FAILING_HEALTH.has(health)) continue;

      for (const [dependentId, hops] of this.upstreamServices(failing.id)) {
        const dependent = this.entities.get('service', dependentId);
        const criticality =
          dependent && isEntityOfType(dependent, 'service')
            ? dependent.criticality ?? null
            : null;

        entries.push({
          failingService: { id: failing.id, name: failing.name, healthStatus: health },
          affectedService: {
            id: dependentId,
            name: nameOf(this.entities, { id: dependentId, type: 'service' }),
            criticality,
          },
          hopsToFailure: hops,
          action: actionFor(criticality),
        });
      }
    }

    return entries.sort(
      (a, b) =>
        ACTION_RANK[a.action] - ACTION_RANK[b.action] || a.hopsToFailure - b.hopsToFailure,
    );
  }

  /** Service dependents of `id` within the cascade depth, at shortest distance. */
  private upstreamServices(id: string): Map<string, number> {
    const dist = new Map<string, number>([[id, 0]]);
    const found = new Map<string, number>();
    const queue = new FifoQueue<string>([id]);

    for (let current = queue.dequeue(); current !== undefined; current = queue.dequeue()) {
      const depth = dist.get(current) ?? 0;
      if (depth >= HEALTH_CASCADE_MAX_DEPTH) continue;

      for (const edge of this.store.getDependentsOf(current)) {
        if (dist.has(edge.sourceId)) continue;
        dist.set(edge.sourceId, depth + 1);
        if (edge.sourceType === 'service') found.set(edge.sourceId, depth + 1);
        queue.enqueue(edge.sourceId);
      }
    }

    return found;
  }

  private distinctRelated(
    edges: readonly DependencyEdge[],
    side: 'source' | 'target',
  ): RelatedEntity[] {
    const seen = new Set<string>();
    const out: RelatedEntity[] = [];

    for (const edge of edges) {
      const ref: EntityRef =
        side === 'source'
          ? { id: edge.sourceId, type: edge.sourceType }
          : { id: edge.targetId, type: edge.targetType };
      if (seen.has(ref.id)) continue;
      seen.add(ref.id);

      out.push({
        entity: { ...ref, name: nameOf(this.entities, ref) },
        dependencyType: edge.dependencyType,
        severity: edge.severity,
      });
    }

    return out;
  }
}
