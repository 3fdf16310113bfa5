import crypto from 'node:crypto';

import { telemetry as defaultTelemetry, type Telemetry } from '../telemetry/Telemetry';
import type { AddEdgeInput, DependencyEdge } from './DependencyEdge';
import { FifoQueue } from './FifoQueue';

/** Depth bound for the reachability check run on every insertion. */
export const CYCLE_CHECK_MAX_DEPTH = 20;

export type EdgeStoreOptions = {
  now?: () => Date;
  generateId?: () => string;
  telemetry?: Telemetry;
};

// Ids are opaque: no trimming or case folding.
const normalizeId = (value: string) => String(value);

const EMPTY: readonly number[] = Object.freeze([]);

/**
 * Append-only store of dependency edges with forward (source → edges) and
 * reverse (target → edges) adjacency indices.
 *
 * Single writer: `addEdge` updates both indices without any locking.
 */
export class EdgeStore {
  private readonly edges: DependencyEdge[] = [];
  private readonly edgeIndexById = new Map<string, number>();
  private readonly bySource = new Map<string, number[]>();
  private readonly byTarget = new Map<string, number[]>();
  private revisionCounter = 0;

  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly telemetry: Telemetry;

  constructor(options: EdgeStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
    this.telemetry = options.telemetry ?? defaultTelemetry;
  }

  get size(): number {
    return this.edges.length;
  }

  /** Incremented on every insertion. */
  get revision(): number {
    return this.revisionCounter;
  }

  /**
   * Appends an edge. The new edge, and only the new edge, is flagged circular
   * when `target` already reaches `source` through existing edges.
   */
  addEdge(input: AddEdgeInput): DependencyEdge {
    const sourceId = normalizeId(input.sourceId);
    const targetId = normalizeId(input.targetId);

    const isCircular = this.hasPath(targetId, sourceId);

    const edge: DependencyEdge = Object.freeze({
      id: this.generateId(),
      sourceId,
      sourceType: input.sourceType ?? 'service',
      targetId,
      targetType: input.targetType ?? 'service',
      dependencyType: input.dependencyType ?? 'runtime',
      severity: input.severity ?? 'medium',
      isCircular,
      createdAt: this.now().toISOString(),
    });

    const idx = this.edges.length;
    this.edges.push(edge);
    this.edgeIndexById.set(edge.id, idx);
    appendIndex(this.bySource, sourceId, idx);
    appendIndex(this.byTarget, targetId, idx);
    this.revisionCounter += 1;

    this.telemetry.record({
      name: 'graph.edge.added',
      tags: {
        sourceId,
        targetId,
        dependencyType: edge.dependencyType,
        circular: isCircular,
      },
      metrics: { edgeCount: this.edges.length },
    });

    return edge;
  }

  /** Edges where `id` is the source (what `id` depends on), in insertion order. */
  getDependenciesOf(id: string): DependencyEdge[] {
    return this.edgesAt(this.bySource.get(normalizeId(id)) ?? EMPTY);
  }

  /** Edges where `id` is the target (who depends on `id`), in insertion order. */
  getDependentsOf(id: string): DependencyEdge[] {
    return this.edgesAt(this.byTarget.get(normalizeId(id)) ?? EMPTY);
  }

  getEdge(edgeId: string): DependencyEdge | null {
    const idx = this.edgeIndexById.get(edgeId);
    return idx === undefined ? null : this.edges[idx];
  }

  getAllEdges(): DependencyEdge[] {
    return this.edges.slice();
  }

  /**
   * Bounded BFS over existing edges. The goal test runs before the depth
   * bound, so a goal sitting one level past `maxDepth` is still found.
   */
  hasPath(fromId: string, toId: string, maxDepth = CYCLE_CHECK_MAX_DEPTH): boolean {
    const goal = normalizeId(toId);
    const visited = new Set<string>();
    const queue = new FifoQueue<[string, number]>([[normalizeId(fromId), 0]]);

    for (let next = queue.dequeue(); next; next = queue.dequeue()) {
      const [current, depth] = next;
      if (current === goal) return true;
      if (visited.has(current) || depth > maxDepth) continue;
      visited.add(current);

      for (const idx of this.bySource.get(current) ?? EMPTY) {
        queue.enqueue([this.edges[idx].targetId, depth + 1]);
      }
    }

    return false;
  }

  private edgesAt(indices: readonly number[]): DependencyEdge[] {
    return indices.map((i) => this.edges[i]);
  }
}

const appendIndex = (index: Map<string, number[]>, key: string, idx: number) => {
  const list = index.get(key);
  if (list) list.push(idx);
  else index.set(key, [idx]);
};
