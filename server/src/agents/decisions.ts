import { store } from '../lib/store.js';
import { NotFoundError, OutcomeNotApplicableError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { assertApplicationTransition } from './status.js';
import { disagreesWithVerdict, learnFromOutcome, learnFromOverride } from './learning.js';
import { recordTeamDecision, recordTeamOutcome } from './teams.js';
import type {
  Application,
  CouncilAgent,
  CouncilDecision,
  GrantOutcome,
  HumanVerdict,
  Observation,
} from './types.js';

export async function getDecision(id: string): Promise<CouncilDecision> {
  const decision = await store.get('decision', id);
  if (!decision) throw new NotFoundError('Decision', id);
  return decision;
}

export async function findDecisionForApplication(applicationId: string): Promise<CouncilDecision | null> {
  const [decision] = await store.list('decision', (d) => d.application_id === applicationId);
  return decision ?? null;
}

export async function getApplication(id: string): Promise<Application> {
  const application = await store.get('application', id);
  if (!application) throw new NotFoundError('Application', id);
  return application;
}

export interface HumanDecisionInput {
  decision: HumanVerdict;
  rationale: string;
  reviewer: string;
}

export interface HumanDecisionResult {
  decision: CouncilDecision;
  application: Application;
  overridden: boolean;
  /** Background reflection; resolves with the drafts created, never rejects. Null when nothing disagreed. */
  learning: Promise<Observation[]> | null;
}

/**
 * Attach a reviewer's verdict to a decision and move the application to
 * the final status. A verdict that differs from the council's
 * recommendation starts override reflection without waiting for it.
 */
export async function recordHumanDecision(
  decisionId: string,
  input: HumanDecisionInput,
  roster: CouncilAgent[],
  log: Logger,
  now: Date = new Date(),
): Promise<HumanDecisionResult> {
  const decision = await getDecision(decisionId);
  const application = await getApplication(decision.application_id);
  const status = assertApplicationTransition(application.status, input.decision);
  const timestamp = now.toISOString();

  const updatedDecision: CouncilDecision = {
    ...decision,
    human_decision: {
      decision: input.decision,
      rationale: input.rationale,
      reviewer: input.reviewer,
      decided_at: timestamp,
    },
    decided_at: timestamp,
  };
  const updatedApplication: Application = { ...application, status, updated_at: timestamp };

  await store.put('decision', updatedDecision.id, updatedDecision);
  await store.put('application', updatedApplication.id, updatedApplication);
  if (updatedApplication.team_id) {
    await recordTeamDecision(updatedApplication.team_id, updatedApplication.id, input.decision, now);
  }

  const overridden = disagreesWithVerdict(decision.recommendation, input.decision);
  log.info(
    { decisionId, verdict: input.decision, council: decision.recommendation, overridden },
    'Human decision recorded',
  );

  const learning = overridden
    ? learnFromOverride(updatedDecision, updatedApplication, roster, input.decision, input.rationale, log)
    : null;

  return { decision: updatedDecision, application: updatedApplication, overridden, learning };
}

export interface OutcomeResult {
  decision: CouncilDecision;
  observations: Observation[];
}

/** Record how a funded grant turned out and let every agent reflect on it. */
export async function recordOutcome(
  applicationId: string,
  outcome: GrantOutcome,
  notes: string,
  roster: CouncilAgent[],
  log: Logger,
  now: Date = new Date(),
): Promise<OutcomeResult> {
  const application = await getApplication(applicationId);
  if (application.status !== 'approved' && application.status !== 'auto_approved') {
    throw new OutcomeNotApplicableError(applicationId, application.status);
  }
  const decision = await findDecisionForApplication(applicationId);
  if (!decision) throw new NotFoundError('Decision for application', applicationId);

  const updatedDecision: CouncilDecision = {
    ...decision,
    outcome: { outcome, notes, recorded_at: now.toISOString() },
  };
  await store.put('decision', updatedDecision.id, updatedDecision);
  if (application.team_id) {
    await recordTeamOutcome(application.team_id, applicationId, outcome, now);
  }

  const observations = await learnFromOutcome(updatedDecision, application, roster, outcome, notes, log);
  return { decision: updatedDecision, observations };
}
