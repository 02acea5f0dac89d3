/**
 * Deliberation coordinator.
 *
 * Each round shows every agent its own current evaluation and its peers'
 * under neutral "Reviewer X" labels. Only significant revisions replace an
 * evaluation; a round in which nobody moves ends deliberation.
 */

import { createHash, randomUUID } from 'node:crypto';
import { gateway } from '../lib/llm.js';
import { errorMessage } from '../lib/errors.js';
import { MAX_DELIBERATION_ROUNDS, POSITION_CHANGE_THRESHOLD } from '../lib/config.js';
import type { Logger } from '../lib/logger.js';
import { RevisionOutputSchema, type RevisionOutput } from './schemas/council-schemas.js';
import { formatApplication } from './application-format.js';
import { EVALUATOR_SYSTEM_PROMPT } from './evaluator.js';
import type {
  AgentEvaluation,
  Application,
  CouncilAgent,
  DeliberationResult,
  Recommendation,
} from './types.js';

const SCORE_EPSILON = 1e-9;
const REVISION_TEMPERATURE = 0.3;

// ─── Anonymization ───────────────────────────────────────────────────

function labelLetters(index: number): string {
  let n = index;
  let letters = '';
  do {
    letters = String.fromCharCode(65 + (n % 26)) + letters;
    n = Math.floor(n / 26) - 1;
  } while (n >= 0);
  return letters;
}

function roundHash(agentId: string, round: number): string {
  return createHash('sha256').update(`${round}:${agentId}`).digest('hex');
}

/**
 * Neutral reviewer labels for one round. Agents are ordered by a per-round
 * hash of their id, so labels are stable within a round and shuffle between
 * rounds. Pure: same ids and round, same labels.
 */
export function anonymize(agentIds: string[], round: number): Map<string, string> {
  const ordered = [...new Set(agentIds)].sort((a, b) => {
    const ha = roundHash(a, round);
    const hb = roundHash(b, round);
    return ha < hb ? -1 : ha > hb ? 1 : 0;
  });
  return new Map(ordered.map((id, i) => [id, `Reviewer ${labelLetters(i)}`]));
}

// ─── Revision significance ───────────────────────────────────────────

export function isSignificantRevision(
  prior: { score: number; recommendation: Recommendation },
  next: { score: number; recommendation: Recommendation },
  threshold: number = POSITION_CHANGE_THRESHOLD,
): boolean {
  if (prior.recommendation !== next.recommendation) return true;
  return Math.abs(next.score - prior.score) >= threshold - SCORE_EPSILON;
}

// ─── Prompts ─────────────────────────────────────────────────────────

function listOrNone(items: string[]): string {
  return items.length > 0 ? items.join('; ') : 'None listed';
}

function formatPosition(evaluation: AgentEvaluation): string {
  return [
    `**Score:** ${evaluation.score.toFixed(2)} | **Recommendation:** ${evaluation.recommendation} | **Confidence:** ${Math.round(evaluation.confidence * 100)}%`,
    '',
    `**Rationale:** ${evaluation.rationale}`,
    '',
    `**Strengths:** ${listOrNone(evaluation.strengths)}`,
    '',
    `**Concerns:** ${listOrNone(evaluation.concerns)}`,
  ].join('\n');
}

export function buildRevisionPrompt(
  agent: CouncilAgent,
  application: Application,
  own: AgentEvaluation,
  peers: Array<{ label: string; evaluation: AgentEvaluation }>,
  round: number,
): string {
  const peerText = peers
    .map(({ label, evaluation }) => `## ${label}\n${formatPosition(evaluation)}`)
    .join('\n\n');

  return `# Your Role
${agent.persona}

# Deliberation Round ${round}

You previously evaluated this application. Now you can see how the other reviewers assessed it.

# Application
${formatApplication(application)}

# Your Current Evaluation
${formatPosition(own)}

# Other Reviewers' Assessments
${peerText}

# Your Task
Review the other assessments. Did others identify strengths or concerns you missed? Do their arguments change your view?
You may revise your position or maintain it. If revising, explain what changed your mind.

Respond with JSON:
{
  "score": number 0-1,
  "recommendation": "approve" | "reject" | "needs_review",
  "confidence": number 0-1,
  "revision_rationale": "what changed, or why you are maintaining your position",
  "rationale": "optional updated rationale",
  "strengths": ["optional updated list"],
  "concerns": ["optional updated list"],
  "questions": ["optional updated list"]
}`;
}

function revisedEvaluation(prior: AgentEvaluation, output: RevisionOutput, round: number): AgentEvaluation {
  return {
    ...prior,
    id: randomUUID(),
    score: output.score,
    recommendation: output.recommendation,
    confidence: output.confidence,
    rationale: output.rationale?.trim() ? output.rationale : prior.rationale,
    strengths: output.strengths ?? prior.strengths,
    concerns: output.concerns ?? prior.concerns,
    questions: output.questions ?? prior.questions,
    round,
    prior_score: prior.score,
    prior_recommendation: prior.recommendation,
    revision_rationale: output.revision_rationale,
    degraded: false,
    created_at: new Date().toISOString(),
  };
}

// ─── Coordinator ─────────────────────────────────────────────────────

export interface DeliberationHooks {
  onRoundStart?: (round: number) => void;
  onRevision?: (evaluation: AgentEvaluation) => void;
  onRoundComplete?: (round: number, revisions: number, evaluations: AgentEvaluation[]) => void;
}

export interface DeliberationOptions {
  maxRounds?: number;
  threshold?: number;
  log: Logger;
  hooks?: DeliberationHooks;
}

/** The agent's revision for this round, or null to keep its current evaluation. Never rejects. */
async function reviseWithAgent(
  agent: CouncilAgent,
  application: Application,
  current: AgentEvaluation[],
  labels: Map<string, string>,
  round: number,
  threshold: number,
  log: Logger,
): Promise<AgentEvaluation | null> {
  const own = current.find((e) => e.agent_id === agent.id);
  if (!own) return null;

  const peers = current
    .filter((e) => e.agent_id !== agent.id)
    .map((evaluation) => ({ label: labels.get(evaluation.agent_id) ?? 'Reviewer', evaluation }))
    .sort((a, b) => a.label.localeCompare(b.label));

  let output: RevisionOutput;
  try {
    output = await gateway.invokeStructured({
      model: agent.model,
      system: EVALUATOR_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: buildRevisionPrompt(agent, application, own, peers, round) }],
      temperature: REVISION_TEMPERATURE,
    }, RevisionOutputSchema);
  } catch (err) {
    log.warn({ agentId: agent.id, round, error: errorMessage(err) }, 'Revision call failed, keeping prior evaluation');
    return null;
  }

  if (!isSignificantRevision(own, output, threshold)) return null;
  return revisedEvaluation(own, output, round);
}

export async function runDeliberation(
  application: Application,
  roster: CouncilAgent[],
  initial: AgentEvaluation[],
  options: DeliberationOptions,
): Promise<DeliberationResult> {
  const maxRounds = options.maxRounds ?? MAX_DELIBERATION_ROUNDS;
  const threshold = options.threshold ?? POSITION_CHANGE_THRESHOLD;
  const { log, hooks } = options;

  let current = [...initial];
  const history = [...initial];
  const revisionsPerRound: number[] = [];
  let stoppedEarly = false;

  if (roster.length < 2 || maxRounds <= 0) {
    return {
      evaluations: current,
      record: { rounds_run: 0, revisions_per_round: [], stopped_early: false, history },
    };
  }

  for (let round = 1; round <= maxRounds; round++) {
    hooks?.onRoundStart?.(round);
    const labels = anonymize(roster.map((a) => a.id), round);

    const snapshot = current;
    const revisions = await Promise.all(roster.map(async (agent) => {
      const revision = await reviseWithAgent(agent, application, snapshot, labels, round, threshold, log);
      if (revision) hooks?.onRevision?.(revision);
      return revision;
    }));

    const revised = revisions.filter((r): r is AgentEvaluation => r !== null);
    current = snapshot.map((evaluation) => (
      revised.find((r) => r.agent_id === evaluation.agent_id) ?? evaluation
    ));
    history.push(...revised);
    revisionsPerRound.push(revised.length);

    log.info({ round, revisions: revised.length }, 'Deliberation round complete');
    hooks?.onRoundComplete?.(round, revised.length, current);

    if (revised.length === 0) {
      stoppedEarly = round < maxRounds;
      break;
    }
  }

  return {
    evaluations: current,
    record: {
      rounds_run: revisionsPerRound.length,
      revisions_per_round: revisionsPerRound,
      stopped_early: stoppedEarly,
      history,
    },
  };
}
