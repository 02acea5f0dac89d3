import { randomUUID } from 'node:crypto';
import { store } from '../lib/store.js';
import { NotFoundError } from '../lib/errors.js';
import {
  MAX_OBSERVATIONS_PER_PROMPT,
  PRUNE_MAX_AGE_DAYS,
  PRUNE_MIN_EVIDENCE,
} from '../lib/config.js';
import logger from '../lib/logger.js';
import { assertObservationTransition } from './status.js';
import type {
  CouncilAgent,
  Observation,
  ObservationSource,
  ObservationStatus,
} from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function recency(observation: Observation): number {
  return Date.parse(observation.last_used_at ?? observation.created_at);
}

/**
 * Pure selection step of retrieval: active observations owned by the agent
 * whose tags intersect `tags`, most evidence first, then most recently used
 * (or created), capped at `limit`.
 */
export function rankObservations(
  observations: Observation[],
  agentId: string,
  tags: Iterable<string>,
  limit = MAX_OBSERVATIONS_PER_PROMPT,
): Observation[] {
  const wanted = new Set([...tags].map((t) => t.toLowerCase()));
  return observations
    .filter((o) => o.status === 'active' && o.agent_id === agentId)
    .filter((o) => o.tags.some((t) => wanted.has(t.toLowerCase())))
    .sort((a, b) => (b.evidence.length - a.evidence.length) || (recency(b) - recency(a)))
    .slice(0, limit);
}

/**
 * Observations an agent sees in its prompt for an application. Every
 * returned observation is counted as used.
 */
export async function retrieveObservations(
  agent: CouncilAgent,
  domainTags: string[],
  now: Date = new Date(),
): Promise<Observation[]> {
  const owned = await store.list('observation', (o) => o.agent_id === agent.id && o.status === 'active');
  const selected = rankObservations(owned, agent.id, [...agent.tags, ...domainTags]);

  const usedAt = now.toISOString();
  const updated = selected.map((o) => ({ ...o, times_used: o.times_used + 1, last_used_at: usedAt }));
  await Promise.all(updated.map((o) => store.put('observation', o.id, o)));
  return updated;
}

// ─── Creation & lifecycle ────────────────────────────────────────────

export interface NewObservation {
  agent_id: string;
  pattern: string;
  tags: string[];
  confidence: number;
  source: ObservationSource;
  evidence: string[];
}

export async function createDraftObservation(input: NewObservation, now: Date = new Date()): Promise<Observation> {
  const observation: Observation = {
    id: randomUUID(),
    agent_id: input.agent_id,
    pattern: input.pattern.trim(),
    tags: [...new Set(input.tags.map((t) => t.trim().toLowerCase()).filter(Boolean))],
    evidence: [...new Set(input.evidence)],
    confidence: input.confidence,
    source: input.source,
    status: 'draft',
    times_used: 0,
    created_at: now.toISOString(),
  };
  await store.put('observation', observation.id, observation);
  return observation;
}

async function loadObservation(id: string): Promise<Observation> {
  const observation = await store.get('observation', id);
  if (!observation) throw new NotFoundError('Observation', id);
  return observation;
}

async function moveObservation(
  id: string,
  to: ObservationStatus,
  patch: Partial<Observation> = {},
): Promise<Observation> {
  const observation = await loadObservation(id);
  const status = assertObservationTransition(observation.status, to);
  const updated: Observation = { ...observation, ...patch, status };
  await store.put('observation', id, updated);
  logger.info({ observationId: id, from: observation.status, to }, 'Observation status changed');
  return updated;
}

export function reviewObservation(id: string, reviewer: string): Promise<Observation> {
  return moveObservation(id, 'reviewed', { reviewed_by: reviewer });
}

/** Human promotion; only active observations reach agent prompts. */
export function activateObservation(id: string, reviewer: string, now: Date = new Date()): Promise<Observation> {
  return moveObservation(id, 'active', { reviewed_by: reviewer, validated_at: now.toISOString() });
}

export function deprecateObservation(id: string): Promise<Observation> {
  return moveObservation(id, 'deprecated');
}

export interface ObservationQuery {
  agent_id?: string;
  status?: ObservationStatus;
  stale_only?: boolean;
}

export async function listObservations(query: ObservationQuery = {}): Promise<Observation[]> {
  const observations = await store.list('observation', (o) => (
    (query.agent_id === undefined || o.agent_id === query.agent_id)
    && (query.status === undefined || o.status === query.status)
    && (!query.stale_only || o.flagged_stale_at !== undefined)
  ));
  return observations.sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at));
}

export async function countObservations(agentId: string): Promise<number> {
  const owned = await store.list('observation', (o) => o.agent_id === agentId && o.status !== 'deprecated');
  return owned.length;
}

// ─── Pruning ─────────────────────────────────────────────────────────

export interface PruneOptions {
  minEvidence?: number;
  maxAgeDays?: number;
  /** Also deprecate what gets flagged. An explicit human action; off by default. */
  autoDeprecate?: boolean;
  now?: Date;
}

export function isStale(
  observation: Observation,
  minEvidence: number,
  maxAgeDays: number,
  now: Date,
): boolean {
  if (observation.status === 'deprecated') return false;
  const ageMs = now.getTime() - Date.parse(observation.created_at);
  return observation.times_used < minEvidence && ageMs > maxAgeDays * DAY_MS;
}

/**
 * Flag rarely used, old observations for human attention. Nothing is
 * deleted; `flagged_stale_at` keeps the time of the first flag.
 */
export async function pruneStaleObservations(options: PruneOptions = {}): Promise<Observation[]> {
  const minEvidence = options.minEvidence ?? PRUNE_MIN_EVIDENCE;
  const maxAgeDays = options.maxAgeDays ?? PRUNE_MAX_AGE_DAYS;
  const now = options.now ?? new Date();

  const candidates = await store.list('observation', (o) => isStale(o, minEvidence, maxAgeDays, now));
  const flagged: Observation[] = [];
  for (const observation of candidates) {
    const updated: Observation = {
      ...observation,
      flagged_stale_at: observation.flagged_stale_at ?? now.toISOString(),
      ...(options.autoDeprecate ? { status: 'deprecated' as const } : {}),
    };
    await store.put('observation', updated.id, updated);
    flagged.push(updated);
  }

  logger.info(
    { flagged: flagged.length, minEvidence, maxAgeDays, autoDeprecate: Boolean(options.autoDeprecate) },
    'Observation prune pass complete',
  );
  return flagged;
}
