export type Severity = 'low' | 'medium' | 'high' | 'critical';

export type EntityRef = {
  id: string;
  type: string;
};

/**
 * Directed dependency: `source` depends on `target`.
 *
 * `isCircular` is decided once, when the edge is inserted, and is never
 * re-evaluated when later edges arrive.
 */
export type DependencyEdge = {
  readonly id: string;
  readonly sourceId: string;
  readonly sourceType: string;
  readonly targetId: string;
  readonly targetType: string;
  readonly dependencyType: string;
  readonly severity: Severity;
  readonly isCircular: boolean;
  /** ISO-8601 */
  readonly createdAt: string;
};

export type AddEdgeInput = {
  sourceId: string;
  targetId: string;
  sourceType?: string;
  targetType?: string;
  dependencyType?: string;
  severity?: Severity;
};

export type TransitiveDependency = DependencyEdge & {
  readonly hopsFromSource: number;
};

export type AffectedEntity = {
  id: string;
  type: string;
  name: string;
  severity: Severity;
  hopsAway: number;
};

export type BlastRadiusResult = {
  root: EntityRef & { name: string };
  blastRadius: number;
  affected: AffectedEntity[];
  maxDepth: number;
};
