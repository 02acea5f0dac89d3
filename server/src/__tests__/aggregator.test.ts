import { describe, it, expect } from 'vitest';
import { aggregateEvaluations, unanimousRecommendation } from '../agents/aggregator.js';
import { CouncilInvariantError } from '../lib/errors.js';
import { makeEvaluation } from './council-fixtures.js';

describe('aggregateEvaluations', () => {
  it('computes mean score, mean confidence and population variance', () => {
    const stats = aggregateEvaluations([
      makeEvaluation('technical', 0.9, 'approve', { confidence: 0.8 }),
      makeEvaluation('ecosystem', 0.88, 'approve', { confidence: 0.9 }),
      makeEvaluation('budget', 0.95, 'approve', { confidence: 0.85 }),
      makeEvaluation('impact', 0.87, 'approve', { confidence: 0.85 }),
    ]);

    expect(stats.average_score).toBeCloseTo(0.9, 10);
    expect(stats.average_confidence).toBeCloseTo(0.85, 10);
    expect(stats.score_variance).toBeCloseTo(0.00095, 10);
    expect(stats.min_score).toBe(0.87);
    expect(stats.max_score).toBe(0.95);
    expect(stats.unanimous).toBe(true);
    expect(stats.recommendation_counts).toEqual({ approve: 4, reject: 0, needs_review: 0 });
  });

  it('is not unanimous when any recommendation differs', () => {
    const stats = aggregateEvaluations([
      makeEvaluation('technical', 0.9, 'approve'),
      makeEvaluation('ecosystem', 0.5, 'needs_review'),
    ]);
    expect(stats.unanimous).toBe(false);
    expect(stats.recommendation_counts).toEqual({ approve: 1, reject: 0, needs_review: 1 });
    expect(unanimousRecommendation(stats)).toBeNull();
  });

  it('has zero variance for a single evaluation', () => {
    const stats = aggregateEvaluations([makeEvaluation('technical', 0.4, 'reject')]);
    expect(stats.score_variance).toBe(0);
    expect(stats.unanimous).toBe(true);
    expect(unanimousRecommendation(stats)).toBe('reject');
  });

  it('keeps the averages inside the range of their inputs', () => {
    const low = aggregateEvaluations(['technical', 'ecosystem', 'impact'].map((id) => (
      makeEvaluation(id, 0.1, 'reject')
    )));
    expect(low.average_score).toBe(0.1);

    const six = aggregateEvaluations(Array.from({ length: 6 }, (_, i) => (
      makeEvaluation(`agent-${i}`, 0.9, 'approve', { confidence: 0.8 })
    )));
    expect(six.average_confidence).toBe(0.8);
    expect(six.average_score).toBe(0.9);
  });

  it('includes degraded placeholders like any other evaluation', () => {
    const stats = aggregateEvaluations([
      makeEvaluation('technical', 0.9, 'approve', { confidence: 0.9 }),
      makeEvaluation('budget', 0.5, 'needs_review', { confidence: 0, degraded: true }),
    ]);
    expect(stats.average_score).toBeCloseTo(0.7, 10);
    expect(stats.average_confidence).toBeCloseTo(0.45, 10);
    expect(stats.unanimous).toBe(false);
  });

  it('returns the same statistics when called twice', () => {
    const evaluations = [
      makeEvaluation('technical', 0.3, 'reject'),
      makeEvaluation('impact', 0.6, 'needs_review'),
    ];
    expect(aggregateEvaluations(evaluations)).toEqual(aggregateEvaluations(evaluations));
  });

  it('throws an invariant error for an empty set', () => {
    expect(() => aggregateEvaluations([])).toThrow(CouncilInvariantError);
    expect(() => aggregateEvaluations([])).toThrow('Cannot aggregate an empty set of evaluations');
  });
});
