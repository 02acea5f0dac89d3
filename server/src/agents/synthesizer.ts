import { gateway, SYNTHESIS_MODEL } from '../lib/llm.js';
import { errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { SynthesisOutputSchema } from './schemas/council-schemas.js';
import { formatMoney } from './application-format.js';
import type {
  AgentEvaluation,
  AggregateStats,
  Application,
  RoutingDecision,
} from './types.js';

export interface SynthesisResult {
  synthesis: string;
  applicant_feedback: string;
  /** True when the model call failed and the templated text was used */
  fallback: boolean;
}

const SYNTHESIS_SYSTEM_PROMPT = 'You are synthesizing a grants council decision. Be thorough but concise. Respond only with valid JSON.';

function formatEvaluation(evaluation: AgentEvaluation): string {
  const lines = [
    `## ${evaluation.agent_name}${evaluation.degraded ? ' (evaluation unavailable)' : ''}`,
    `Score ${evaluation.score.toFixed(2)} | ${evaluation.recommendation} | confidence ${Math.round(evaluation.confidence * 100)}%`,
    evaluation.rationale,
  ];
  if (evaluation.strengths.length > 0) lines.push(`Strengths: ${evaluation.strengths.join('; ')}`);
  if (evaluation.concerns.length > 0) lines.push(`Concerns: ${evaluation.concerns.join('; ')}`);
  if (evaluation.questions.length > 0) lines.push(`Questions: ${evaluation.questions.join('; ')}`);
  return lines.join('\n');
}

export function buildSynthesisPrompt(
  application: Application,
  evaluations: AgentEvaluation[],
  stats: AggregateStats,
  routing: RoutingDecision,
): string {
  const reasons = routing.review_reasons.length > 0
    ? routing.review_reasons.map((r) => `- ${r}`).join('\n')
    : '- none';

  return `# Council Decision Synthesis

## Application
**Title:** ${application.title}
**Team:** ${application.team_name}
**Funding Requested:** ${formatMoney(application.funding_requested, application.currency)}

## Aggregated Results
- Average score: ${stats.average_score.toFixed(2)}
- Average confidence: ${Math.round(stats.average_confidence * 100)}%
- Score variance: ${stats.score_variance.toFixed(3)}
- Unanimous: ${stats.unanimous ? 'yes' : 'no'}
- Recommendation: ${routing.recommendation}
- Auto-executed: ${routing.auto_executed ? 'yes' : 'no'}

## Review Reasons
${reasons}

## Individual Evaluations
${evaluations.map(formatEvaluation).join('\n\n')}

---

Produce two texts:
1. synthesis: 2-3 paragraphs for program managers covering agreement, notable concerns, disagreements and the rationale for the routing outcome.
2. applicant_feedback: constructive feedback for the applicant that references specific strengths and concerns and, if the application is not approved, what would need to change.

Respond with JSON: { "synthesis": "...", "applicant_feedback": "..." }`;
}

function unique(items: string[]): string[] {
  return [...new Set(items.map((i) => i.trim()).filter(Boolean))];
}

export function templatedSynthesis(
  evaluations: AgentEvaluation[],
  stats: AggregateStats,
  routing: RoutingDecision,
): Omit<SynthesisResult, 'fallback'> {
  const outcome = routing.auto_executed ? 'auto-executed' : 'routed to human review';
  const summary = `The council of ${evaluations.length} evaluators gave an average score of `
    + `${stats.average_score.toFixed(2)} with average confidence ${stats.average_confidence.toFixed(2)} `
    + `(score variance ${stats.score_variance.toFixed(3)}). Recommendation: ${routing.recommendation}, ${outcome}.`;
  const synthesis = routing.review_reasons.length > 0
    ? `${summary}\nReview reasons: ${routing.review_reasons.join('; ')}.`
    : summary;

  const strengths = unique(evaluations.flatMap((e) => e.strengths));
  const concerns = unique(evaluations.filter((e) => !e.degraded).flatMap((e) => e.concerns));
  const feedback = ['Thank you for your application.'];
  if (strengths.length > 0) {
    feedback.push('Strengths noted by the council:', ...strengths.map((s) => `- ${s}`));
  }
  if (concerns.length > 0) {
    feedback.push('Concerns raised:', ...concerns.map((c) => `- ${c}`));
  }
  if (strengths.length === 0 && concerns.length === 0) {
    feedback.push('No specific strengths or concerns were recorded.');
  }

  return { synthesis, applicant_feedback: feedback.join('\n') };
}

/** One inference call; any failure falls back to the templated text. */
export async function synthesizeDecision(
  application: Application,
  evaluations: AgentEvaluation[],
  stats: AggregateStats,
  routing: RoutingDecision,
  log: Logger,
): Promise<SynthesisResult> {
  try {
    const output = await gateway.invokeStructured({
      model: SYNTHESIS_MODEL,
      system: SYNTHESIS_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: buildSynthesisPrompt(application, evaluations, stats, routing) }],
      temperature: 0.5,
    }, SynthesisOutputSchema);
    return { ...output, fallback: false };
  } catch (err) {
    log.warn({ error: errorMessage(err) }, 'Synthesis failed, using templated fallback');
    return { ...templatedSynthesis(evaluations, stats, routing), fallback: true };
  }
}
