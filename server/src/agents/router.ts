/**
 * Routing policy. Pure: statistics and application attributes in, a
 * recommendation, an auto-execute flag and human-readable reasons out.
 *
 * 1. Auto-approve: unanimous approve, average score and confidence at or
 *    above their thresholds, funding below the budget review threshold.
 * 2. Auto-reject: unanimous reject, average score at or below the reject
 *    threshold, confidence at or above its threshold.
 * 3. Otherwise human review, with every failed condition listed.
 *
 * Vetoes run last and can only take away auto-execution.
 */

import { FORCE_REVIEW_TAGS, THRESHOLDS, type CouncilThresholds } from '../lib/config.js';
import { unanimousRecommendation } from './aggregator.js';
import type { AggregateStats, Application, RoutingDecision } from './types.js';

export type RoutingVeto = (
  application: Pick<Application, 'funding_requested' | 'domain_tags'>,
  stats: AggregateStats,
) => string | null;

function fixed(value: number): string {
  return value.toFixed(2);
}

function usd(amount: number): string {
  return `$${amount.toLocaleString('en-US', { maximumFractionDigits: 2 })}`;
}

export const REASON_NOT_UNANIMOUS = 'evaluators did not reach unanimous recommendation';
export const REASON_UNANIMOUS_REVIEW = 'evaluators unanimously recommended human review';

function confidenceReason(stats: AggregateStats, thresholds: CouncilThresholds): string | null {
  return stats.average_confidence < thresholds.minConfidence
    ? `average confidence (${fixed(stats.average_confidence)}) below auto-execute threshold (${fixed(thresholds.minConfidence)})`
    : null;
}

function budgetReason(fundingRequested: number, thresholds: CouncilThresholds): string | null {
  if (fundingRequested < thresholds.budgetReview) return null;
  const verb = fundingRequested === thresholds.budgetReview ? 'reaches' : 'exceeds';
  return `funding requested (${usd(fundingRequested)}) ${verb} budget review threshold (${usd(thresholds.budgetReview)})`;
}

function compact(reasons: Array<string | null>): string[] {
  return reasons.filter((r): r is string => r !== null);
}

/** Forces review for applications carrying any of the given tags. */
export function forceReviewTagVeto(tags: string[]): RoutingVeto {
  const forced = new Set(tags.map((t) => t.toLowerCase()));
  return (application) => {
    const hit = application.domain_tags.find((t) => forced.has(t.toLowerCase()));
    return hit ? `application tagged "${hit}" always requires human review` : null;
  };
}

export function defaultVetoes(): RoutingVeto[] {
  return FORCE_REVIEW_TAGS.length > 0 ? [forceReviewTagVeto(FORCE_REVIEW_TAGS)] : [];
}

export function routeDecision(
  stats: AggregateStats,
  application: Pick<Application, 'funding_requested' | 'domain_tags'>,
  thresholds: CouncilThresholds = THRESHOLDS,
  vetoes: RoutingVeto[] = defaultVetoes(),
): RoutingDecision {
  const direction = unanimousRecommendation(stats);
  let reasons: string[];

  if (direction === 'approve') {
    reasons = compact([
      stats.average_score < thresholds.autoApprove
        ? `average score (${fixed(stats.average_score)}) below auto-approve threshold (${fixed(thresholds.autoApprove)})`
        : null,
      confidenceReason(stats, thresholds),
      budgetReason(application.funding_requested, thresholds),
    ]);
  } else if (direction === 'reject') {
    reasons = compact([
      stats.average_score > thresholds.autoReject
        ? `average score (${fixed(stats.average_score)}) above auto-reject threshold (${fixed(thresholds.autoReject)})`
        : null,
      confidenceReason(stats, thresholds),
    ]);
  } else {
    reasons = compact([
      direction === 'needs_review' ? REASON_UNANIMOUS_REVIEW : REASON_NOT_UNANIMOUS,
      confidenceReason(stats, thresholds),
      budgetReason(application.funding_requested, thresholds),
    ]);
  }

  const recommendation = direction ?? 'needs_review';
  let autoExecuted = direction !== null && direction !== 'needs_review' && reasons.length === 0;

  if (autoExecuted) {
    for (const veto of vetoes) {
      const reason = veto(application, stats);
      if (reason) {
        autoExecuted = false;
        reasons.push(reason);
      }
    }
  }

  return {
    recommendation,
    auto_executed: autoExecuted,
    requires_human_review: !autoExecuted,
    review_reasons: reasons,
  };
}
