import { CouncilInvariantError } from '../lib/errors.js';
import type { AgentEvaluation, AggregateStats, Recommendation } from './types.js';

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Mean held inside [min, max] of its inputs; float summation can land just past them. */
function boundedMean(values: number[]): number {
  return Math.min(Math.max(mean(values), Math.min(...values)), Math.max(...values));
}

/**
 * Summary statistics over the council's final evaluations. Pure and
 * idempotent. An empty set is a defect upstream and throws.
 */
export function aggregateEvaluations(evaluations: AgentEvaluation[]): AggregateStats {
  if (evaluations.length === 0) {
    throw new CouncilInvariantError('Cannot aggregate an empty set of evaluations');
  }

  const scores = evaluations.map((e) => e.score);
  const averageScore = boundedMean(scores);
  const counts: Record<Recommendation, number> = { approve: 0, reject: 0, needs_review: 0 };
  for (const evaluation of evaluations) {
    counts[evaluation.recommendation] += 1;
  }

  return {
    average_score: averageScore,
    average_confidence: boundedMean(evaluations.map((e) => e.confidence)),
    score_variance: mean(scores.map((s) => (s - averageScore) ** 2)),
    min_score: Math.min(...scores),
    max_score: Math.max(...scores),
    unanimous: Object.values(counts).filter((c) => c > 0).length === 1,
    recommendation_counts: counts,
  };
}

const RECOMMENDATIONS: readonly Recommendation[] = ['approve', 'reject', 'needs_review'];

/** The shared recommendation when the council is unanimous, otherwise null. */
export function unanimousRecommendation(stats: AggregateStats): Recommendation | null {
  if (!stats.unanimous) return null;
  return RECOMMENDATIONS.find((r) => stats.recommendation_counts[r] > 0) ?? null;
}
