/**
 * Learning loop: human overrides, grant outcomes and historical batches
 * become draft observations. Drafts never reach an agent prompt until a
 * human activates them.
 */

import { gateway } from '../lib/llm.js';
import { errorMessage } from '../lib/errors.js';
import { BOOTSTRAP_TARGET_OBSERVATIONS } from '../lib/config.js';
import type { Logger } from '../lib/logger.js';
import { LearningOutputSchema } from './schemas/council-schemas.js';
import { formatMoney } from './application-format.js';
import { countObservations, createDraftObservation } from './observations.js';
import type {
  AgentEvaluation,
  Application,
  CouncilAgent,
  CouncilDecision,
  GrantOutcome,
  HumanVerdict,
  Observation,
  ObservationSource,
  Recommendation,
} from './types.js';

const REFLECTION_TEMPERATURE = 0.5;

const OBSERVATION_CONTRACT = `Respond with JSON:
{
  "observations": [
    { "pattern": "A clear, specific statement of the pattern", "tags": ["relevant", "tags"], "confidence": 0.0-1.0 }
  ]
}`;

/** needs_review agrees with neither human verdict. */
export function disagreesWithVerdict(recommendation: Recommendation, verdict: HumanVerdict): boolean {
  if (verdict === 'approved') return recommendation !== 'approve';
  return recommendation !== 'reject';
}

function applicationHeader(application: Application): string {
  return [
    `**Title:** ${application.title}`,
    `**Team:** ${application.team_name}`,
    `**Funding:** ${formatMoney(application.funding_requested, application.currency)}`,
    application.summary ? `**Summary:** ${application.summary}` : '',
  ].filter(Boolean).join('\n');
}

function evaluationBlock(evaluation: AgentEvaluation): string {
  return [
    `**Score:** ${evaluation.score.toFixed(2)}`,
    `**Recommendation:** ${evaluation.recommendation}`,
    `**Confidence:** ${Math.round(evaluation.confidence * 100)}%`,
    `**Rationale:** ${evaluation.rationale}`,
    `**Concerns:** ${evaluation.concerns.length > 0 ? evaluation.concerns.join('; ') : 'None'}`,
  ].join('\n');
}

interface ReflectionRequest {
  agent: CouncilAgent;
  system: string;
  prompt: string;
  source: ObservationSource;
  evidence: string[];
  extraTags?: string[];
  /** Most drafts to keep from this reflection */
  limit?: number;
}

/** One reflection call; each returned pattern is stored as a draft. */
async function reflect(request: ReflectionRequest): Promise<Observation[]> {
  const output = await gateway.invokeStructured({
    model: request.agent.model,
    system: request.system,
    messages: [{ role: 'user', content: request.prompt }],
    temperature: REFLECTION_TEMPERATURE,
  }, LearningOutputSchema);

  const created: Observation[] = [];
  for (const learned of output.observations.slice(0, request.limit ?? output.observations.length)) {
    created.push(await createDraftObservation({
      agent_id: request.agent.id,
      pattern: learned.pattern,
      tags: [...learned.tags, ...(request.extraTags ?? [])],
      confidence: learned.confidence,
      source: request.source,
      evidence: request.evidence,
    }));
  }
  return created;
}

async function reflectSafely(request: ReflectionRequest, log: Logger): Promise<Observation[]> {
  try {
    return await reflect(request);
  } catch (err) {
    log.warn(
      { agentId: request.agent.id, source: request.source, error: errorMessage(err) },
      'Reflection failed, no observations recorded',
    );
    return [];
  }
}

// ─── Override ────────────────────────────────────────────────────────

export function buildOverridePrompt(
  agent: CouncilAgent,
  evaluation: AgentEvaluation,
  application: Application,
  verdict: HumanVerdict,
  rationale: string,
): string {
  return `# Learning from Override

You are the ${agent.name}. A human reviewer decided differently from your evaluation.

## Your Evaluation
${evaluationBlock(evaluation)}

## Human Decision
**Decision:** ${verdict}
**Rationale:** ${rationale || 'No rationale given'}

## Application
${applicationHeader(application)}

## Your Task
Reflect on what you might have missed or misjudged. State patterns that would help you decide similar applications better. Each should be specific, actionable and grounded in what the reviewer saw.

${OBSERVATION_CONTRACT}`;
}

/** Each agent whose recommendation differs from the human verdict reflects on it. */
export async function learnFromOverride(
  decision: CouncilDecision,
  application: Application,
  roster: CouncilAgent[],
  verdict: HumanVerdict,
  rationale: string,
  log: Logger,
): Promise<Observation[]> {
  const tasks = decision.evaluations
    .filter((evaluation) => disagreesWithVerdict(evaluation.recommendation, verdict))
    .map((evaluation) => {
      const agent = roster.find((a) => a.id === evaluation.agent_id);
      if (!agent) return Promise.resolve<Observation[]>([]);
      return reflectSafely({
        agent,
        system: 'You are reflecting on a decision to improve future evaluations. Respond only with valid JSON.',
        prompt: buildOverridePrompt(agent, evaluation, application, verdict, rationale),
        source: 'override',
        evidence: [application.id],
      }, log);
    });

  const observations = (await Promise.all(tasks)).flat();
  log.info({ created: observations.length, verdict }, 'Override reflection complete');
  return observations;
}

// ─── Outcome ─────────────────────────────────────────────────────────

export function predictedCorrectly(recommendation: Recommendation, outcome: GrantOutcome): boolean {
  return (recommendation === 'approve') === (outcome === 'success');
}

export function buildOutcomePrompt(
  agent: CouncilAgent,
  evaluation: AgentEvaluation,
  application: Application,
  outcome: GrantOutcome,
  notes: string,
): string {
  const task = predictedCorrectly(evaluation.recommendation, outcome)
    ? 'The outcome corroborates your evaluation. What in the application helped you make the right call? State it so you recognize similar cases.'
    : 'The outcome contradicts your evaluation. What did you miss? State what to watch for in similar applications.';

  return `# Learning from Outcome

You are the ${agent.name}. A grant you evaluated has finished and the outcome is known.

## Your Evaluation
${evaluationBlock(evaluation)}

## Actual Outcome
**Result:** ${outcome.toUpperCase()}
**Notes:** ${notes || 'None'}

## Application
${applicationHeader(application)}

## Your Task
${task}

${OBSERVATION_CONTRACT}`;
}

export async function learnFromOutcome(
  decision: CouncilDecision,
  application: Application,
  roster: CouncilAgent[],
  outcome: GrantOutcome,
  notes: string,
  log: Logger,
): Promise<Observation[]> {
  const tasks = decision.evaluations.map((evaluation) => {
    const agent = roster.find((a) => a.id === evaluation.agent_id);
    if (!agent) return Promise.resolve<Observation[]>([]);
    return reflectSafely({
      agent,
      system: 'You are learning from grant outcomes to improve future evaluations. Respond only with valid JSON.',
      prompt: buildOutcomePrompt(agent, evaluation, application, outcome, notes),
      source: 'outcome',
      evidence: [application.id],
      extraTags: application.domain_tags,
    }, log);
  });

  const observations = (await Promise.all(tasks)).flat();
  log.info({ created: observations.length, outcome }, 'Outcome reflection complete');
  return observations;
}

// ─── Bootstrap ───────────────────────────────────────────────────────

export interface HistoricalApplication {
  id: string;
  title: string;
  team_name: string;
  summary: string;
  funding_requested: number;
  outcome: GrantOutcome;
  outcome_notes: string;
  domain_tags: string[];
}

export function buildBootstrapPrompt(agent: CouncilAgent, item: HistoricalApplication): string {
  return `# Bootstrap Your Expertise

You are the ${agent.name}. You are building evaluation expertise from past grants with known outcomes.

## Your Role
${agent.persona}

## Historical Application
**Title:** ${item.title}
**Team:** ${item.team_name}
**Funding:** ${formatMoney(item.funding_requested)}
**Summary:** ${item.summary || 'None'}
**Outcome:** ${item.outcome.toUpperCase()}
**Notes:** ${item.outcome_notes || 'None'}

## Your Task
Identify patterns in this application that explain its outcome and that are relevant to your focus (${agent.tags.join(', ')}).

${OBSERVATION_CONTRACT}`;
}

/**
 * Reflect over the batch item by item until the agent owns `target`
 * non-deprecated observations or the batch runs out.
 */
export async function bootstrapAgent(
  agent: CouncilAgent,
  items: HistoricalApplication[],
  log: Logger,
  target: number = BOOTSTRAP_TARGET_OBSERVATIONS,
): Promise<Observation[]> {
  let owned = await countObservations(agent.id);
  const created: Observation[] = [];

  for (const item of items) {
    if (owned >= target) break;
    const batch = await reflectSafely({
      agent,
      system: 'You are developing evaluation expertise from historical data. Respond only with valid JSON.',
      prompt: buildBootstrapPrompt(agent, item),
      source: 'bootstrap',
      evidence: [item.id],
      extraTags: item.domain_tags,
      limit: target - owned,
    }, log);
    created.push(...batch);
    owned += batch.length;
  }

  log.info({ agentId: agent.id, created: created.length, owned, target }, 'Bootstrap complete');
  return created;
}

export async function bootstrapCouncil(
  roster: CouncilAgent[],
  items: HistoricalApplication[],
  log: Logger,
  target: number = BOOTSTRAP_TARGET_OBSERVATIONS,
): Promise<Record<string, Observation[]>> {
  const results = await Promise.all(roster.map(async (agent) => (
    [agent.id, await bootstrapAgent(agent, items, log, target)] as const
  )));
  return Object.fromEntries(results);
}
