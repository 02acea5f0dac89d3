/**
 * Evaluation dispatcher: one structured inference call per council agent,
 * all agents concurrently. A call that fails twice yields a degraded
 * evaluation instead of failing the council.
 */

import { randomUUID } from 'node:crypto';
import { gateway } from '../lib/llm.js';
import { GatewayError, errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { EvaluationOutputSchema, type EvaluationOutput } from './schemas/council-schemas.js';
import { formatApplication, milestoneAdvisory } from './application-format.js';
import { retrieveObservations } from './observations.js';
import type {
  AgentEvaluation,
  Application,
  CouncilAgent,
  EvaluationContext,
  Observation,
} from './types.js';

export const EVALUATOR_SYSTEM_PROMPT = 'You are an expert grant evaluator. Respond only with valid JSON.';

const MAX_COMPARABLE_APPLICATIONS = 3;

/** Agents carrying any of these tags get the milestone note */
const BUDGET_FOCUS_TAGS = ['budget', 'milestones'];
const EVALUATION_TEMPERATURE = 0.5;

const OUTPUT_CONTRACT = `Provide your evaluation as JSON with these fields:
- score: number 0-1 (0 = strong reject, 0.5 = uncertain, 1 = strong approve)
- recommendation: "approve" | "reject" | "needs_review"
- confidence: number 0-1 (how confident you are in your assessment)
- rationale: string (2-3 paragraphs explaining your reasoning)
- strengths: list of strings (specific positives you identified)
- concerns: list of strings (specific issues or red flags)
- questions: list of strings (questions you'd want answered before deciding)

Be specific. Reference concrete details from the application.`;

export function buildEvaluationPrompt(
  agent: CouncilAgent,
  application: Application,
  observations: Observation[],
  context: EvaluationContext,
): string {
  const sections: string[] = ['# Your Role', agent.persona, ''];

  if (observations.length > 0) {
    sections.push('# Patterns You\'ve Learned');
    sections.push('Based on your experience reviewing applications, you have observed:');
    for (const observation of observations) {
      sections.push(`- ${observation.pattern} (confidence: ${Math.round(observation.confidence * 100)}%)`);
    }
    sections.push('');
  }

  if (context.team_summary) {
    sections.push('# Team History', context.team_summary, '');
  }

  if (context.comparable_applications.length > 0) {
    sections.push('# Similar Past Applications');
    for (const comparable of context.comparable_applications.slice(0, MAX_COMPARABLE_APPLICATIONS)) {
      sections.push(`- **${comparable.title}**: ${comparable.status}`);
    }
    sections.push('');
  }

  sections.push('# Application to Evaluate', formatApplication(application), '');

  if (agent.tags.some((tag) => BUDGET_FOCUS_TAGS.includes(tag))) {
    const note = milestoneAdvisory(application);
    if (note) sections.push('# Budget Note', note, '');
  }

  sections.push('# Your Evaluation', OUTPUT_CONTRACT);
  return sections.join('\n');
}

export function degradedEvaluation(
  agent: CouncilAgent,
  applicationId: string,
  failure: unknown,
  round = 0,
): AgentEvaluation {
  const reason = failure instanceof GatewayError
    ? `${failure.kind}: ${failure.message}`
    : errorMessage(failure);
  return {
    id: randomUUID(),
    application_id: applicationId,
    agent_id: agent.id,
    agent_name: agent.name,
    score: 0.5,
    recommendation: 'needs_review',
    confidence: 0,
    rationale: `Evaluation unavailable after retry (${reason}).`,
    strengths: [],
    concerns: ['Evaluation could not be completed'],
    questions: [],
    round,
    observations_used: [],
    degraded: true,
    created_at: new Date().toISOString(),
  };
}

/** One retry with the identical request, then the caller's fallback applies. */
export async function callWithOneRetry<T>(
  call: () => Promise<T>,
  log: Logger,
  label: Record<string, unknown>,
): Promise<T> {
  try {
    return await call();
  } catch (firstError) {
    log.warn({ ...label, error: errorMessage(firstError) }, 'Agent call failed, retrying once');
    return call();
  }
}

async function observationsFor(agent: CouncilAgent, application: Application, log: Logger): Promise<Observation[]> {
  try {
    return await retrieveObservations(agent, application.domain_tags);
  } catch (err) {
    log.warn({ agentId: agent.id, error: errorMessage(err) }, 'Observation retrieval failed, evaluating without');
    return [];
  }
}

/** Resolves with a real or degraded evaluation; never rejects. */
export async function evaluateWithAgent(
  agent: CouncilAgent,
  application: Application,
  context: EvaluationContext,
  log: Logger,
): Promise<AgentEvaluation> {
  const observations = await observationsFor(agent, application, log);
  const prompt = buildEvaluationPrompt(agent, application, observations, context);

  let output: EvaluationOutput;
  try {
    output = await callWithOneRetry(
      () => gateway.invokeStructured({
        model: agent.model,
        system: EVALUATOR_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: prompt }],
        temperature: EVALUATION_TEMPERATURE,
      }, EvaluationOutputSchema),
      log,
      { agentId: agent.id, round: 0 },
    );
  } catch (err) {
    log.warn({ agentId: agent.id, error: errorMessage(err) }, 'Agent evaluation degraded');
    return degradedEvaluation(agent, application.id, err);
  }

  return {
    id: randomUUID(),
    application_id: application.id,
    agent_id: agent.id,
    agent_name: agent.name,
    score: output.score,
    recommendation: output.recommendation,
    confidence: output.confidence,
    rationale: output.rationale,
    strengths: output.strengths,
    concerns: output.concerns,
    questions: output.questions,
    round: 0,
    observations_used: observations.map((o) => o.id),
    degraded: false,
    created_at: new Date().toISOString(),
  };
}

/**
 * Round-0 evaluations for every agent, returned in roster order.
 * `onEvaluation` fires as each agent finishes.
 */
export async function runInitialEvaluations(
  application: Application,
  roster: CouncilAgent[],
  context: EvaluationContext,
  log: Logger,
  onEvaluation?: (evaluation: AgentEvaluation) => void,
): Promise<AgentEvaluation[]> {
  return Promise.all(roster.map(async (agent) => {
    const evaluation = await evaluateWithAgent(agent, application, context, log);
    onEvaluation?.(evaluation);
    return evaluation;
  }));
}
