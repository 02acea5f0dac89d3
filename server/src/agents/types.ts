/**
 * Shared type definitions for the grants council.
 *
 * Applications, decisions, observations and team profiles are independent
 * top-level records related only by id. Council steps take these as typed
 * input and return typed output; persistence happens in the pipeline.
 */

// ─── Applications ────────────────────────────────────────────────────

export type ApplicationStatus =
  | 'pending'
  | 'evaluating'
  | 'deliberating'
  | 'auto_approved'
  | 'auto_rejected'
  | 'needs_review'
  | 'approved'
  | 'rejected';

export interface TeamMember {
  name: string;
  role: string;
  wallet_address?: string;
  bio?: string;
}

export interface BudgetItem {
  category: string;
  description: string;
  amount: number;
}

export interface Milestone {
  title: string;
  description: string;
  /** Advisory; percentages are expected to sum to 100 but never corrected */
  funding_percentage: number;
}

export interface ApplicationLinks {
  website?: string;
  github?: string;
  demo?: string;
}

export interface Application {
  id: string;
  title: string;
  summary: string;
  description: string;
  team_name: string;
  team_id?: string;
  team_members: TeamMember[];
  problem_statement: string;
  proposed_solution: string;
  technical_approach: string;
  prior_work: string;
  funding_requested: number;
  currency: string;
  budget_breakdown: BudgetItem[];
  milestones: Milestone[];
  domain_tags: string[];
  links: ApplicationLinks;
  submitted_at: string;
  status: ApplicationStatus;
  updated_at: string;
}

// ─── Agents & evaluations ────────────────────────────────────────────

export type Recommendation = 'approve' | 'reject' | 'needs_review';

export interface CouncilAgent {
  id: string;
  name: string;
  persona: string;
  tags: string[];
  model: string;
}

export interface AgentEvaluation {
  id: string;
  application_id: string;
  agent_id: string;
  agent_name: string;
  score: number;
  recommendation: Recommendation;
  confidence: number;
  rationale: string;
  strengths: string[];
  concerns: string[];
  questions: string[];
  /** 0 for the initial evaluation, N for a revision in deliberation round N */
  round: number;
  prior_score?: number;
  prior_recommendation?: Recommendation;
  revision_rationale?: string;
  observations_used: string[];
  /** Set when the agent's call failed twice and a neutral placeholder was recorded */
  degraded: boolean;
  created_at: string;
}

/** Optional context handed to every agent's initial prompt */
export interface EvaluationContext {
  team_summary?: string;
  /** Always empty: similarity search over past applications is not offered */
  comparable_applications: Application[];
}

// ─── Deliberation & aggregation ──────────────────────────────────────

export interface DeliberationRecord {
  rounds_run: number;
  revisions_per_round: number[];
  stopped_early: boolean;
  /** Every evaluation produced, initial and revised, in creation order */
  history: AgentEvaluation[];
}

export interface DeliberationResult {
  evaluations: AgentEvaluation[];
  record: DeliberationRecord;
}

export interface AggregateStats {
  average_score: number;
  average_confidence: number;
  score_variance: number;
  min_score: number;
  max_score: number;
  unanimous: boolean;
  recommendation_counts: Record<Recommendation, number>;
}

export interface RoutingDecision {
  recommendation: Recommendation;
  auto_executed: boolean;
  requires_human_review: boolean;
  review_reasons: string[];
}

// ─── Decisions ───────────────────────────────────────────────────────

export type HumanVerdict = 'approved' | 'rejected';

export interface HumanDecision {
  decision: HumanVerdict;
  rationale: string;
  reviewer: string;
  decided_at: string;
}

export type GrantOutcome = 'success' | 'failure';

export interface OutcomeRecord {
  outcome: GrantOutcome;
  notes: string;
  recorded_at: string;
}

export interface CouncilDecision {
  id: string;
  application_id: string;
  evaluations: AgentEvaluation[];
  average_score: number;
  average_confidence: number;
  score_variance: number;
  recommendation: Recommendation;
  auto_executed: boolean;
  requires_human_review: boolean;
  review_reasons: string[];
  synthesis: string;
  applicant_feedback: string;
  human_decision?: HumanDecision;
  deliberation: DeliberationRecord;
  outcome?: OutcomeRecord;
  created_at: string;
  decided_at: string;
}

// ─── Observations ────────────────────────────────────────────────────

export type ObservationStatus = 'draft' | 'reviewed' | 'active' | 'deprecated';
export type ObservationSource = 'override' | 'outcome' | 'bootstrap';

export interface Observation {
  id: string;
  agent_id: string;
  pattern: string;
  tags: string[];
  /** Application ids that support the pattern */
  evidence: string[];
  confidence: number;
  source: ObservationSource;
  status: ObservationStatus;
  times_used: number;
  created_at: string;
  last_used_at?: string;
  reviewed_by?: string;
  validated_at?: string;
  flagged_stale_at?: string;
}

// ─── Teams ───────────────────────────────────────────────────────────

export interface TeamProfile {
  id: string;
  canonical_name: string;
  aliases: string[];
  wallet_addresses: string[];
  application_ids: string[];
  /** application id → final approve/reject, human or automatic */
  decisions: Record<string, HumanVerdict>;
  /** application id → reported grant outcome */
  outcomes: Record<string, GrantOutcome>;
  created_at: string;
  updated_at: string;
}

// ─── Event stream ────────────────────────────────────────────────────

export type CouncilStage =
  | 'parsing'
  | 'initial_evaluation'
  | `deliberation_round_${number}`
  | 'aggregation'
  | 'synthesis';

export type CouncilEvent =
  | { type: 'stage'; stage: CouncilStage; status: 'started' | 'complete'; data: Record<string, unknown> }
  | {
      type: 'agent_evaluation';
      stage: CouncilStage;
      agent_id: string;
      agent_name: string;
      round: number;
      score: number;
      recommendation: Recommendation;
      degraded: boolean;
    }
  | {
      type: 'complete';
      recommendation: Recommendation;
      synthesis: string;
      feedback: string;
      average_score: number;
      decision_id: string;
      application_id: string;
    }
  | { type: 'error'; message: string };

export type CouncilEmit = (event: CouncilEvent) => void;
