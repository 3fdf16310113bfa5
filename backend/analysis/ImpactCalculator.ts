import type { BlastRadiusResult, Severity } from '../graph/DependencyEdge';
import type {
  FailureSimulation,
  GraphQueries,
  HealthCascadeEntry,
  ServiceContext,
} from '../graph/GraphQueries';
import { classifyFailureSeverity, recommendationsFor } from './ImpactSeverity';

export type BlastRadiusReport = BlastRadiusResult & {
  context: ServiceContext;
  recommendations: string[];
};

export type FailureReportSummary = {
  simulation: FailureSimulation;
  severity: Severity;
  /** Graph-wide: dependents of services already reported unhealthy or degraded. */
  cascadeEffects: HealthCascadeEntry[];
};

/**
 * Turns raw graph answers into operator-facing impact reports.
 *
 * Non-responsibilities:
 * - No traversal of its own; everything comes from GraphQueries.
 * - No configurable weights.
 */
export class ImpactCalculator {
  private readonly queries: GraphQueries;

  constructor(queries: GraphQueries) {
    this.queries = queries;
  }

  calculateBlastRadius(id: string, type = 'service'): BlastRadiusReport {
    const blast = this.queries.calculateBlastRadius(id, type);
    const context = this.queries.getServiceContext(id, type);

    return {
      ...blast,
      context,
      recommendations: recommendationsFor({
        blastRadius: blast.blastRadius,
        upstreamCount: context.upstream.length,
        downstreamCount: context.downstream.length,
      }),
    };
  }

  simulateFailure(id: string, type = 'service'): FailureReportSummary {
    const simulation = this.queries.simulateFailure(id, type);
    return {
      simulation,
      severity: classifyFailureSeverity(simulation.totalImpact),
      cascadeEffects: this.queries.getHealthCascade(),
    };
  }
}
