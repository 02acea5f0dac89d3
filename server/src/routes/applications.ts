import { Hono, type Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { store } from '../lib/store.js';
import { parseJsonBody } from '../lib/validate.js';
import { errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import {
  ApplicationSubmissionSchema,
  applicationFromSubmission,
  parseFreeformApplication,
} from '../agents/intake.js';
import { runCouncil, runCouncilFromText } from '../agents/pipeline.js';
import { findDecisionForApplication, getApplication, recordOutcome } from '../agents/decisions.js';
import { getRoster } from '../agents/roster.js';
import type { ApplicationStatus, CouncilDecision, CouncilEmit, CouncilEvent } from '../agents/types.js';

const intakeSchema = z.object({
  text: z.string().min(1).max(100_000),
});

const outcomeSchema = z.object({
  outcome: z.enum(['success', 'failure']),
  notes: z.string().max(10_000).optional().default(''),
});

const STATUSES = [
  'pending', 'evaluating', 'deliberating', 'auto_approved',
  'auto_rejected', 'needs_review', 'approved', 'rejected',
] as const satisfies readonly ApplicationStatus[];

const listQuerySchema = z.object({
  status: z.enum(STATUSES).optional(),
});

const applications = new Hono();

// Application ids with an evaluation in flight in this process
const runningEvaluations = new Set<string>();

export function getEvaluationRouteStats() {
  return { running_evaluations: runningEvaluations.size };
}

function runLogger(c: Context, applicationId: string): Logger {
  return c.get('log').child({ applicationId });
}

/**
 * SSE sink for one run. Writes are chained so events reach the client in
 * emit order; once the client disconnects further events are dropped but
 * the run itself carries on.
 */
function sseSink(write: (event: CouncilEvent) => Promise<void>, log: Logger) {
  let chain: Promise<void> = Promise.resolve();
  let closed = false;
  const emit: CouncilEmit = (event) => {
    chain = chain.then(async () => {
      if (closed) return;
      await write(event);
    }).catch((err: unknown) => {
      closed = true;
      log.warn({ error: errorMessage(err) }, 'SSE write failed, dropping remaining events');
    });
  };
  return {
    emit,
    close: () => { closed = true; },
    drain: () => chain,
  };
}

// POST /applications — structured submission
applications.post('/', async (c) => {
  const parsed = await parseJsonBody(c, ApplicationSubmissionSchema);
  if (!parsed.ok) return parsed.response;

  const application = applicationFromSubmission(parsed.data);
  await store.put('application', application.id, application);
  c.get('log').info({ applicationId: application.id }, 'Application submitted');
  return c.json({ application }, 201);
});

// POST /applications/intake — raw text, parsed by the intake model
applications.post('/intake', async (c) => {
  const parsed = await parseJsonBody(c, intakeSchema);
  if (!parsed.ok) return parsed.response;

  const log = c.get('log');
  const application = await parseFreeformApplication(parsed.data.text, log);
  await store.put('application', application.id, application);
  log.info({ applicationId: application.id }, 'Freeform application parsed');
  return c.json({ application }, 201);
});

// POST /applications/intake/stream — parse raw text then evaluate, as SSE
applications.post('/intake/stream', async (c) => {
  const parsed = await parseJsonBody(c, intakeSchema);
  if (!parsed.ok) return parsed.response;

  const log = c.get('log');
  return streamSSE(c, async (stream) => {
    const sink = sseSink((event) => stream.writeSSE({ event: event.type, data: JSON.stringify(event) }), log);
    stream.onAbort(sink.close);
    try {
      await runCouncilFromText(parsed.data.text, { emit: sink.emit, log });
    } catch (err) {
      // Already reported on the stream as an `error` event
      log.warn({ error: errorMessage(err) }, 'Streamed intake run failed');
    }
    await sink.drain();
  });
});

// GET /applications — newest first, optionally filtered by status
applications.get('/', async (c) => {
  const query = listQuerySchema.safeParse({ status: c.req.query('status') });
  if (!query.success) {
    return c.json({ error: 'Invalid request', details: query.error.issues }, 400);
  }
  const { status } = query.data;
  const items = await store.list('application', (a) => status === undefined || a.status === status);
  items.sort((a, b) => Date.parse(b.submitted_at) - Date.parse(a.submitted_at));
  return c.json({ applications: items });
});

// GET /applications/:id — application with its decision, if any
applications.get('/:id', async (c) => {
  const application = await getApplication(c.req.param('id'));
  const decision = await findDecisionForApplication(application.id);
  return c.json({ application, decision });
});

// POST /applications/:id/evaluate — run the council and return the decision
applications.post('/:id/evaluate', async (c) => {
  const application = await getApplication(c.req.param('id'));
  if (runningEvaluations.has(application.id)) {
    return c.json({ error: 'Evaluation already in progress' }, 409);
  }

  const log = runLogger(c, application.id);
  runningEvaluations.add(application.id);
  let decision: CouncilDecision;
  try {
    decision = await runCouncil(application, {
      emit: (event) => log.debug({ event: event.type }, 'Council event'),
      log,
    });
  } finally {
    runningEvaluations.delete(application.id);
  }
  return c.json({ decision });
});

// POST /applications/:id/evaluate/stream — same run, progress as SSE
applications.post('/:id/evaluate/stream', async (c) => {
  const application = await getApplication(c.req.param('id'));
  if (runningEvaluations.has(application.id)) {
    return c.json({ error: 'Evaluation already in progress' }, 409);
  }

  const log = runLogger(c, application.id);
  runningEvaluations.add(application.id);
  return streamSSE(c, async (stream) => {
    const sink = sseSink((event) => stream.writeSSE({ event: event.type, data: JSON.stringify(event) }), log);
    stream.onAbort(() => {
      log.info('Client disconnected, evaluation continues');
      sink.close();
    });
    try {
      await runCouncil(application, { emit: sink.emit, log });
    } catch (err) {
      log.warn({ error: errorMessage(err) }, 'Streamed evaluation failed');
    } finally {
      runningEvaluations.delete(application.id);
    }
    await sink.drain();
  });
});

// POST /applications/:id/outcome — grant outcome, triggers outcome reflection
applications.post('/:id/outcome', async (c) => {
  const parsed = await parseJsonBody(c, outcomeSchema);
  if (!parsed.ok) return parsed.response;

  const applicationId = c.req.param('id');
  const result = await recordOutcome(
    applicationId,
    parsed.data.outcome,
    parsed.data.notes,
    getRoster(),
    runLogger(c, applicationId),
  );
  return c.json({ decision: result.decision, observations: result.observations });
});

export { applications };
