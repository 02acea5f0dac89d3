import { ObservationTransitionError, StatusTransitionError } from '../lib/errors.js';
import type { ApplicationStatus, ObservationStatus, Recommendation } from './types.js';

const APPLICATION_TRANSITIONS: Record<ApplicationStatus, readonly ApplicationStatus[]> = {
  pending: ['evaluating'],
  evaluating: ['deliberating', 'evaluating'],
  deliberating: ['auto_approved', 'auto_rejected', 'needs_review', 'evaluating'],
  auto_approved: ['approved', 'rejected', 'evaluating'],
  auto_rejected: ['approved', 'rejected', 'evaluating'],
  needs_review: ['approved', 'rejected', 'evaluating'],
  approved: ['rejected'],
  rejected: ['approved'],
};

export function canTransitionApplication(from: ApplicationStatus, to: ApplicationStatus): boolean {
  return APPLICATION_TRANSITIONS[from].includes(to);
}

/** Returns `to` when the move is legal, otherwise throws StatusTransitionError. */
export function assertApplicationTransition(
  from: ApplicationStatus,
  to: ApplicationStatus,
): ApplicationStatus {
  if (!canTransitionApplication(from, to)) {
    throw new StatusTransitionError('application', from, to);
  }
  return to;
}

/** Terminal status the router's verdict puts an application in. */
export function statusForRecommendation(
  recommendation: Recommendation,
  autoExecuted: boolean,
): ApplicationStatus {
  if (!autoExecuted) return 'needs_review';
  if (recommendation === 'approve') return 'auto_approved';
  if (recommendation === 'reject') return 'auto_rejected';
  return 'needs_review';
}

// ─── Observations ────────────────────────────────────────────────────

const OBSERVATION_TRANSITIONS: Record<ObservationStatus, readonly ObservationStatus[]> = {
  draft: ['reviewed', 'active', 'deprecated'],
  reviewed: ['active', 'deprecated'],
  active: ['deprecated'],
  deprecated: [],
};

export function assertObservationTransition(
  from: ObservationStatus,
  to: ObservationStatus,
): ObservationStatus {
  if (!OBSERVATION_TRANSITIONS[from].includes(to)) {
    throw new ObservationTransitionError(from, to);
  }
  return to;
}
