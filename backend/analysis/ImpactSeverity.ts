import type { Severity } from '../graph/DependencyEdge';

const toNonNegativeInt = (value: number): number => {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.trunc(value));
};

/**
 * Severity of a simulated failure from its raw impact count.
 *
 * Explicit thresholds; keep these stable, callers compare against them.
 */
export const classifyFailureSeverity = (totalImpact: number): Severity => {
  const total = toNonNegativeInt(totalImpact);
  if (total >= 10) return 'critical';
  if (total >= 5) return 'high';
  if (total >= 2) return 'medium';
  return 'low';
};

export type RecommendationInput = {
  blastRadius: number;
  upstreamCount: number;
  downstreamCount: number;
};

export const RECOMMENDATIONS = {
  circuitBreakers:
    'CRITICAL: High blast radius. Consider adding circuit breakers.',
  degradedMode:
    'Add fallback/degraded-mode capabilities for downstream consumers.',
  splitService:
    'Many upstream dependents. Consider splitting into smaller services.',
  bulkhead: 'Multiple critical dependencies. Implement bulkhead patterns.',
  noConcerns: 'No immediate concerns. Continue monitoring.',
} as const;

/** Fixed-threshold recommendations, in a stable order. */
export const recommendationsFor = (input: RecommendationInput): string[] => {
  const out: string[] = [];

  if (input.blastRadius > 10) out.push(RECOMMENDATIONS.circuitBreakers);
  if (input.blastRadius > 5) out.push(RECOMMENDATIONS.degradedMode);
  if (input.upstreamCount > 5) out.push(RECOMMENDATIONS.splitService);
  if (input.downstreamCount > 3) out.push(RECOMMENDATIONS.bulkhead);

  if (out.length === 0) out.push(RECOMMENDATIONS.noConcerns);
  return out;
};
