function envNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function envInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function envList(key: string): string[] {
  const raw = process.env[key];
  if (!raw) return [];
  return raw.split(',').map((v) => v.trim().toLowerCase()).filter(Boolean);
}

// ─── Routing thresholds ──────────────────────────────────────────────

export interface CouncilThresholds {
  /** Minimum average score for auto-approval */
  autoApprove: number;
  /** Maximum average score for auto-rejection */
  autoReject: number;
  /** Funding at or above this always goes to a human */
  budgetReview: number;
  /** Minimum average confidence for any auto-executed outcome */
  minConfidence: number;
}

export const THRESHOLDS: CouncilThresholds = {
  autoApprove: envNumber('AUTO_APPROVE_THRESHOLD', 0.85),
  autoReject: envNumber('AUTO_REJECT_THRESHOLD', 0.15),
  budgetReview: envNumber('BUDGET_REVIEW_THRESHOLD', 50_000),
  minConfidence: envNumber('AUTO_EXECUTE_MIN_CONFIDENCE', 0.8),
};

/** Application tags that always force human review, lowercase */
export const FORCE_REVIEW_TAGS = envList('FORCE_REVIEW_TAGS');

// ─── Deliberation ────────────────────────────────────────────────────

export const MAX_DELIBERATION_ROUNDS = envInt('MAX_DELIBERATION_ROUNDS', 2);

/** Minimum score change that counts as a position revision */
export const POSITION_CHANGE_THRESHOLD = envNumber('POSITION_CHANGE_THRESHOLD', 0.15);

export const MAX_OBSERVATIONS_PER_PROMPT = 5;

// ─── Learning loop ───────────────────────────────────────────────────

export const PRUNE_MIN_EVIDENCE = envInt('PRUNE_MIN_EVIDENCE', 5);
export const PRUNE_MAX_AGE_DAYS = envInt('PRUNE_MAX_AGE_DAYS', 180);
export const BOOTSTRAP_TARGET_OBSERVATIONS = envInt('BOOTSTRAP_TARGET_OBSERVATIONS', 30);

// ─── Storage ─────────────────────────────────────────────────────────

export const DATA_DIR = process.env.DATA_DIR ?? './data';
