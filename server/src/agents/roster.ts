import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { CouncilAgent } from './types.js';

const DEFAULT_ROSTER_PATH = fileURLToPath(
  new URL('../../config/council-agents.json', import.meta.url),
);

const CouncilAgentSchema = z.object({
  id: z.string().min(1).regex(/^[a-z0-9_-]+$/, 'agent ids are lowercase slugs'),
  name: z.string().min(1),
  persona: z.string().min(1),
  tags: z.array(z.string().min(1)).transform((tags) => tags.map((t) => t.toLowerCase())),
  model: z.string().min(1),
});

const RosterFileSchema = z.object({
  agents: z.array(CouncilAgentSchema).min(1),
}).refine(
  (roster) => new Set(roster.agents.map((a) => a.id)).size === roster.agents.length,
  { message: 'agent ids must be unique' },
);

/**
 * Parse and validate a roster document. `modelOverride` replaces every
 * agent's model, which is how a deployment pins all agents to one model.
 */
export function parseRoster(raw: unknown, modelOverride?: string): CouncilAgent[] {
  const parsed = RosterFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid roster';
    throw new Error(`Invalid council roster (${where})`);
  }
  return parsed.data.agents.map((agent) => (
    modelOverride ? { ...agent, model: modelOverride } : agent
  ));
}

export function loadRoster(filePath = process.env.COUNCIL_AGENTS_PATH ?? DEFAULT_ROSTER_PATH): CouncilAgent[] {
  const resolved = path.resolve(filePath);
  const raw: unknown = JSON.parse(readFileSync(resolved, 'utf8'));
  return parseRoster(raw, process.env.COUNCIL_AGENT_MODEL || undefined);
}

let cachedRoster: CouncilAgent[] | null = null;

/** Configured council agents in roster order. Loaded once per process. */
export function getRoster(): CouncilAgent[] {
  if (!cachedRoster) {
    cachedRoster = loadRoster();
  }
  return cachedRoster;
}

export function findAgent(agentId: string): CouncilAgent | undefined {
  return getRoster().find((agent) => agent.id === agentId);
}
