/**
 * Council pipeline: initial evaluation → deliberation rounds → aggregation
 * and routing → synthesis → persisted decision.
 *
 * The driver owns stage boundaries on the event stream: every stage emits
 * `started` then `complete`, and the run ends with exactly one `complete`
 * or `error` event.
 */

import { randomUUID } from 'node:crypto';
import { store } from '../lib/store.js';
import { MAX_DELIBERATION_ROUNDS, THRESHOLDS } from '../lib/config.js';
import { CouncilInvariantError, PipelineAbortError, errorMessage } from '../lib/errors.js';
import { createRunLogger, type Logger } from '../lib/logger.js';
import { recordCouncilFailure, recordCouncilRun } from '../lib/metrics.js';
import { getRoster } from './roster.js';
import { runInitialEvaluations } from './evaluator.js';
import { runDeliberation } from './deliberation.js';
import { aggregateEvaluations } from './aggregator.js';
import { routeDecision, type RoutingVeto } from './router.js';
import { synthesizeDecision } from './synthesizer.js';
import { assertApplicationTransition, statusForRecommendation } from './status.js';
import { findDecisionForApplication } from './decisions.js';
import { formatTeamSummary, recordTeamDecision, upsertTeamForApplication } from './teams.js';
import { parseFreeformApplication } from './intake.js';
import type {
  AgentEvaluation,
  AggregateStats,
  Application,
  ApplicationStatus,
  CouncilAgent,
  CouncilDecision,
  CouncilEmit,
  CouncilStage,
  EvaluationContext,
  RoutingDecision,
} from './types.js';

export interface CouncilRunOptions {
  emit: CouncilEmit;
  log?: Logger;
  roster?: CouncilAgent[];
  maxRounds?: number;
  vetoes?: RoutingVeto[];
}

function stageEmitter(emit: CouncilEmit) {
  return {
    started(stage: CouncilStage, data: Record<string, unknown> = {}) {
      emit({ type: 'stage', stage, status: 'started', data });
    },
    complete(stage: CouncilStage, data: Record<string, unknown> = {}) {
      emit({ type: 'stage', stage, status: 'complete', data });
    },
    evaluation(stage: CouncilStage, evaluation: AgentEvaluation) {
      emit({
        type: 'agent_evaluation',
        stage,
        agent_id: evaluation.agent_id,
        agent_name: evaluation.agent_name,
        round: evaluation.round,
        score: evaluation.score,
        recommendation: evaluation.recommendation,
        degraded: evaluation.degraded,
      });
    },
  };
}

async function moveApplication(application: Application, to: ApplicationStatus): Promise<Application> {
  const status = assertApplicationTransition(application.status, to);
  const updated: Application = { ...application, status, updated_at: new Date().toISOString() };
  await store.put('application', updated.id, updated);
  return updated;
}

async function buildContext(application: Application, log: Logger): Promise<{
  application: Application;
  context: EvaluationContext;
}> {
  try {
    const team = await upsertTeamForApplication(application);
    const linked: Application = application.team_id === team.id ? application : { ...application, team_id: team.id };
    if (linked !== application) {
      await store.put('application', linked.id, linked);
    }
    const summary = formatTeamSummary(team, application.id);
    return {
      application: linked,
      context: { ...(summary ? { team_summary: summary } : {}), comparable_applications: [] },
    };
  } catch (err) {
    log.warn({ error: errorMessage(err) }, 'Team lookup failed, evaluating without team history');
    return { application, context: { comparable_applications: [] } };
  }
}

function aggregateAndRoute(
  evaluations: AgentEvaluation[],
  application: Application,
  vetoes: RoutingVeto[] | undefined,
  log: Logger,
): { stats: AggregateStats; routing: RoutingDecision } {
  try {
    const stats = aggregateEvaluations(evaluations);
    return { stats, routing: routeDecision(stats, application, THRESHOLDS, vetoes) };
  } catch (err) {
    if (err instanceof CouncilInvariantError) {
      log.error({ err }, 'Council invariant violated during aggregation');
    }
    throw err;
  }
}

/**
 * Run the full council on a stored application and persist the decision.
 * Re-running replaces the application's previous decision, keeping its id.
 */
export async function runCouncil(
  input: Application | null | undefined,
  options: CouncilRunOptions,
): Promise<CouncilDecision> {
  const { emit } = options;
  if (!input) {
    const abort = new PipelineAbortError('No application to evaluate');
    emit({ type: 'error', message: abort.message });
    throw abort;
  }

  const log = options.log ?? createRunLogger(input.id);
  const roster = options.roster ?? getRoster();
  const maxRounds = options.maxRounds ?? MAX_DELIBERATION_ROUNDS;
  const stages = stageEmitter(emit);
  const startedAt = Date.now();

  try {
    let application = await moveApplication(input, 'evaluating');
    const built = await buildContext(application, log);
    application = built.application;

    // ─── Initial evaluation ──────────────────────────────────────
    stages.started('initial_evaluation', { agents: roster.map((a) => a.id) });
    const initial = await runInitialEvaluations(
      application,
      roster,
      built.context,
      log,
      (evaluation) => stages.evaluation('initial_evaluation', evaluation),
    );
    const degraded = initial.filter((e) => e.degraded).length;
    stages.complete('initial_evaluation', { evaluations: initial.length, degraded });

    application = await moveApplication(application, 'deliberating');

    // ─── Deliberation ────────────────────────────────────────────
    const deliberation = await runDeliberation(application, roster, initial, {
      maxRounds,
      log,
      hooks: {
        onRoundStart: (round) => stages.started(`deliberation_round_${round}`, { round }),
        onRevision: (evaluation) => stages.evaluation(`deliberation_round_${evaluation.round}`, evaluation),
        onRoundComplete: (round, revisions) => stages.complete(`deliberation_round_${round}`, { round, revisions }),
      },
    });

    // ─── Aggregation & routing ───────────────────────────────────
    stages.started('aggregation');
    const { stats, routing } = aggregateAndRoute(deliberation.evaluations, application, options.vetoes, log);
    stages.complete('aggregation', { ...stats, ...routing });

    // ─── Synthesis ───────────────────────────────────────────────
    stages.started('synthesis');
    const synthesis = await synthesizeDecision(application, deliberation.evaluations, stats, routing, log);
    stages.complete('synthesis', { fallback: synthesis.fallback });

    // ─── Persist ─────────────────────────────────────────────────
    const previous = await findDecisionForApplication(application.id);
    const now = new Date().toISOString();
    const decision: CouncilDecision = {
      id: previous?.id ?? randomUUID(),
      application_id: application.id,
      evaluations: deliberation.evaluations,
      average_score: stats.average_score,
      average_confidence: stats.average_confidence,
      score_variance: stats.score_variance,
      recommendation: routing.recommendation,
      auto_executed: routing.auto_executed,
      requires_human_review: routing.requires_human_review,
      review_reasons: routing.review_reasons,
      synthesis: synthesis.synthesis,
      applicant_feedback: synthesis.applicant_feedback,
      deliberation: deliberation.record,
      created_at: previous?.created_at ?? now,
      decided_at: now,
    };
    await store.put('decision', decision.id, decision);

    application = await moveApplication(
      application,
      statusForRecommendation(routing.recommendation, routing.auto_executed),
    );
    if (routing.auto_executed && application.team_id && routing.recommendation !== 'needs_review') {
      await recordTeamDecision(
        application.team_id,
        application.id,
        routing.recommendation === 'approve' ? 'approved' : 'rejected',
      );
    }

    log.info({
      decisionId: decision.id,
      recommendation: decision.recommendation,
      autoExecuted: decision.auto_executed,
      roundsRun: decision.deliberation.rounds_run,
      stoppedEarly: decision.deliberation.stopped_early,
      durationMs: Date.now() - startedAt,
    }, 'Council run complete');
    recordCouncilRun({
      durationMs: Date.now() - startedAt,
      recommendation: decision.recommendation,
      autoExecuted: decision.auto_executed,
      degradedEvaluations: decision.evaluations.filter((e) => e.degraded).length,
      fallbackSynthesis: synthesis.fallback,
      roundsRun: decision.deliberation.rounds_run,
    });

    emit({
      type: 'complete',
      recommendation: decision.recommendation,
      synthesis: decision.synthesis,
      feedback: decision.applicant_feedback,
      average_score: decision.average_score,
      decision_id: decision.id,
      application_id: application.id,
    });
    return decision;
  } catch (err) {
    log.error({ error: errorMessage(err) }, 'Council run failed');
    recordCouncilFailure();
    emit({ type: 'error', message: errorMessage(err) });
    throw err;
  }
}

/**
 * Parse raw text into an application, store it, then run the council.
 * Emits the `parsing` stage ahead of the council stages.
 */
export async function runCouncilFromText(
  rawText: string,
  options: CouncilRunOptions,
): Promise<CouncilDecision> {
  const { emit } = options;
  const stages = stageEmitter(emit);
  const log = options.log ?? createRunLogger('intake');

  stages.started('parsing');
  let application: Application;
  try {
    application = await parseFreeformApplication(rawText, log);
    await store.put('application', application.id, application);
  } catch (err) {
    const abort = new PipelineAbortError(`Could not parse application: ${errorMessage(err)}`);
    emit({ type: 'error', message: abort.message });
    throw abort;
  }
  stages.complete('parsing', { application_id: application.id, title: application.title });

  return runCouncil(application, { ...options, log: log.child({ applicationId: application.id }) });
}
