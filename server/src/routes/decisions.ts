import { Hono } from 'hono';
import { z } from 'zod';
import { store } from '../lib/store.js';
import { parseJsonBody } from '../lib/validate.js';
import { errorMessage } from '../lib/errors.js';
import { getDecision, recordHumanDecision } from '../agents/decisions.js';
import { getRoster } from '../agents/roster.js';

const humanDecisionSchema = z.object({
  decision: z.enum(['approved', 'rejected']),
  rationale: z.string().min(1).max(10_000),
  reviewer: z.string().min(1).max(200),
});

const listQuerySchema = z.object({
  pending_review: z.enum(['true', 'false']).optional(),
});

const decisions = new Hono();

// GET /decisions — newest first; ?pending_review=true for the review queue
decisions.get('/', async (c) => {
  const query = listQuerySchema.safeParse({ pending_review: c.req.query('pending_review') });
  if (!query.success) {
    return c.json({ error: 'Invalid request', details: query.error.issues }, 400);
  }
  const pendingOnly = query.data.pending_review === 'true';
  const items = await store.list('decision', (d) => (
    !pendingOnly || (d.requires_human_review && d.human_decision === undefined)
  ));
  items.sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at));
  return c.json({ decisions: items });
});

decisions.get('/:id', async (c) => {
  const decision = await getDecision(c.req.param('id'));
  return c.json({ decision });
});

// POST /decisions/:id/human-decision — reviewer verdict; overrides trigger reflection
decisions.post('/:id/human-decision', async (c) => {
  const parsed = await parseJsonBody(c, humanDecisionSchema);
  if (!parsed.ok) return parsed.response;

  const decisionId = c.req.param('id');
  const log = c.get('log').child({ decisionId });
  const result = await recordHumanDecision(decisionId, parsed.data, getRoster(), log);

  // Reflection runs after the response; it reports its own failures.
  void result.learning?.then((drafts) => {
    log.info({ drafts: drafts.length }, 'Override reflection finished');
  }).catch((err: unknown) => {
    log.error({ error: errorMessage(err) }, 'Override reflection failed');
  });

  return c.json({
    decision: result.decision,
    application: result.application,
    overridden: result.overridden,
  });
});

export { decisions };
