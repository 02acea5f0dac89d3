import { Hono } from 'hono';
import { z } from 'zod';
import { parseJsonBody } from '../lib/validate.js';
import {
  activateObservation,
  deprecateObservation,
  listObservations,
  pruneStaleObservations,
  reviewObservation,
} from '../agents/observations.js';
import { bootstrapCouncil } from '../agents/learning.js';
import { findAgent, getRoster } from '../agents/roster.js';
import { NotFoundError } from '../lib/errors.js';
import { BOOTSTRAP_TARGET_OBSERVATIONS } from '../lib/config.js';

const listQuerySchema = z.object({
  agent_id: z.string().min(1).max(100).optional(),
  status: z.enum(['draft', 'reviewed', 'active', 'deprecated']).optional(),
  stale: z.enum(['true', 'false']).optional(),
});

const reviewerSchema = z.object({
  reviewer: z.string().min(1).max(200),
});

const pruneSchema = z.object({
  min_evidence: z.number().int().min(0).optional(),
  max_age_days: z.number().int().min(0).optional(),
  auto_deprecate: z.boolean().optional().default(false),
});

const historicalSchema = z.object({
  id: z.string().min(1).max(100),
  title: z.string().min(1).max(300),
  team_name: z.string().max(200).optional().default('Unknown Team'),
  summary: z.string().max(5_000).optional().default(''),
  funding_requested: z.number().finite().nonnegative().optional().default(0),
  outcome: z.enum(['success', 'failure']),
  outcome_notes: z.string().max(5_000).optional().default(''),
  domain_tags: z.array(z.string().min(1).max(50)).max(20).optional().default([]),
});

const bootstrapSchema = z.object({
  applications: z.array(historicalSchema).min(1).max(500),
  agent_id: z.string().min(1).max(100).optional(),
  target: z.number().int().min(1).max(500).optional(),
});

const observations = new Hono();

observations.get('/', async (c) => {
  const query = listQuerySchema.safeParse({
    agent_id: c.req.query('agent_id'),
    status: c.req.query('status'),
    stale: c.req.query('stale'),
  });
  if (!query.success) {
    return c.json({ error: 'Invalid request', details: query.error.issues }, 400);
  }
  const items = await listObservations({
    agent_id: query.data.agent_id,
    status: query.data.status,
    stale_only: query.data.stale === 'true',
  });
  return c.json({ observations: items });
});

observations.post('/:id/review', async (c) => {
  const parsed = await parseJsonBody(c, reviewerSchema);
  if (!parsed.ok) return parsed.response;
  const observation = await reviewObservation(c.req.param('id'), parsed.data.reviewer);
  return c.json({ observation });
});

observations.post('/:id/activate', async (c) => {
  const parsed = await parseJsonBody(c, reviewerSchema);
  if (!parsed.ok) return parsed.response;
  const observation = await activateObservation(c.req.param('id'), parsed.data.reviewer);
  return c.json({ observation });
});

observations.post('/:id/deprecate', async (c) => {
  const observation = await deprecateObservation(c.req.param('id'));
  return c.json({ observation });
});

// POST /observations/prune — flag stale observations; deprecates only when asked
observations.post('/prune', async (c) => {
  const parsed = await parseJsonBody(c, pruneSchema);
  if (!parsed.ok) return parsed.response;
  const flagged = await pruneStaleObservations({
    minEvidence: parsed.data.min_evidence,
    maxAgeDays: parsed.data.max_age_days,
    autoDeprecate: parsed.data.auto_deprecate,
  });
  return c.json({ flagged });
});

// POST /observations/bootstrap — seed drafts from historical grants
observations.post('/bootstrap', async (c) => {
  const parsed = await parseJsonBody(c, bootstrapSchema);
  if (!parsed.ok) return parsed.response;

  const { applications, agent_id: agentId, target = BOOTSTRAP_TARGET_OBSERVATIONS } = parsed.data;
  let roster = getRoster();
  if (agentId !== undefined) {
    const agent = findAgent(agentId);
    if (!agent) throw new NotFoundError('Agent', agentId);
    roster = [agent];
  }

  const log = c.get('log').child({ operation: 'bootstrap' });
  const created = await bootstrapCouncil(roster, applications, log, target);
  return c.json({ created });
});

export { observations };
