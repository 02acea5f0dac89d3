import { vi, describe, it, expect, beforeEach } from 'vitest';
import type { z } from 'zod';
import type { InferenceRequest } from '../lib/llm.js';

const mockInvokeStructured = vi.hoisted(() => vi.fn<(request: InferenceRequest, schema: z.ZodTypeAny) => Promise<unknown>>());
vi.mock('../lib/llm.js', () => ({
  gateway: { invoke: vi.fn(), invokeStructured: mockInvokeStructured },
  SYNTHESIS_MODEL: 'mock-synthesis',
  INTAKE_MODEL: 'mock-intake',
}));
vi.mock('../lib/store.js', async () => {
  const { MemoryRecordStore } = await import('../lib/record-store.js');
  return { store: new MemoryRecordStore() };
});

import { app } from '../index.js';
import { store } from '../lib/store.js';
import { MemoryRecordStore } from '../lib/record-store.js';
import { RevisionOutputSchema } from '../agents/schemas/council-schemas.js';
import type { Application, CouncilDecision, CouncilEvent } from '../agents/types.js';
import { evaluationOutput, makeApplication, revisionOutput } from './council-fixtures.js';

const submission = {
  title: 'Open Indexer',
  summary: 'A shared event indexer for small protocol teams.',
  team_name: 'Lantern Labs',
  funding_requested: 20_000,
  milestones: [
    { title: 'Plugin API', funding_percentage: 50 },
    { title: 'Hosted docs', funding_percentage: 50 },
  ],
};

function postJson(path: string, body: unknown) {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

async function submit(): Promise<Application> {
  const res = await postJson('/api/applications', submission);
  const body = await res.json() as { application: Application };
  return body.application;
}

// Synthesis waits on this gate so a test can act while a run is in flight
let synthesisGate: Promise<void> = Promise.resolve();
let markSynthesisStarted: () => void = () => {};

function holdSynthesis() {
  let release: () => void = () => {};
  synthesisGate = new Promise<void>((resolve) => { release = resolve; });
  const started = new Promise<void>((resolve) => { markSynthesisStarted = resolve; });
  return { started, release: () => release() };
}

function sseEvents(body: string): CouncilEvent[] {
  return body
    .split('\n')
    .filter((line) => line.startsWith('data: '))
    .map((line) => JSON.parse(line.slice('data: '.length)) as CouncilEvent);
}

function stageTrail(events: CouncilEvent[]): string[] {
  return events.flatMap((e) => {
    if (e.type === 'stage') return [`${e.stage}:${e.status}`];
    if (e.type === 'agent_evaluation') return [];
    return [e.type];
  });
}

const COUNCIL_TRAIL = [
  'initial_evaluation:started',
  'initial_evaluation:complete',
  'deliberation_round_1:started',
  'deliberation_round_1:complete',
  'aggregation:started',
  'aggregation:complete',
  'synthesis:started',
  'synthesis:complete',
  'complete',
];

beforeEach(() => {
  synthesisGate = Promise.resolve();
  markSynthesisStarted = () => {};
  mockInvokeStructured.mockReset();
  mockInvokeStructured.mockImplementation(async (request, schema) => {
    if (request.model === 'mock-intake') {
      return schema.parse({ title: 'Solar Grid Mapper', team_name: 'Sun Co', funding_requested: 12_000 });
    }
    if (request.model === 'mock-synthesis') {
      markSynthesisStarted();
      await synthesisGate;
      return schema.parse({ synthesis: 'Fund it.', applicant_feedback: 'Well done.' });
    }
    if (schema === RevisionOutputSchema) return schema.parse(revisionOutput(0.9, 'approve', 0.9));
    return schema.parse(evaluationOutput(0.9, 'approve', 0.9));
  });
  if (store instanceof MemoryRecordStore) store.clear();
});

describe('POST /api/applications', () => {
  it('stores a pending application', async () => {
    const res = await postJson('/api/applications', submission);

    expect(res.status).toBe(201);
    const body = await res.json() as { application: Application };
    expect(body.application).toMatchObject({ title: 'Open Indexer', status: 'pending', currency: 'USD' });
    expect(await store.get('application', body.application.id)).toEqual(body.application);
  });

  it('rejects a submission without a title', async () => {
    const res = await postJson('/api/applications', { ...submission, title: '' });
    expect(res.status).toBe(400);
    const body = await res.json() as { error: string };
    expect(body.error).toBe('Invalid request');
  });

  it('rejects a non-JSON content type', async () => {
    const res = await app.request('/api/applications', {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: 'Open Indexer',
    });
    expect(res.status).toBe(415);
  });

  it('rejects malformed JSON', async () => {
    const res = await app.request('/api/applications', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"title":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON' });
  });
});

describe('GET /api/applications/:id', () => {
  it('returns 404 for an unknown application', async () => {
    const res = await app.request('/api/applications/missing');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Application missing not found' });
  });

  it('returns the application with a null decision before evaluation', async () => {
    const application = await submit();
    const res = await app.request(`/api/applications/${application.id}`);
    expect(res.status).toBe(200);
    const body = await res.json() as { application: Application; decision: CouncilDecision | null };
    expect(body.application.id).toBe(application.id);
    expect(body.decision).toBeNull();
  });
});

describe('evaluation and review', () => {
  it('runs the council and returns the decision', async () => {
    const application = await submit();

    const res = await app.request(`/api/applications/${application.id}/evaluate`, { method: 'POST' });

    expect(res.status).toBe(200);
    const body = await res.json() as { decision: CouncilDecision };
    expect(body.decision).toMatchObject({
      application_id: application.id,
      recommendation: 'approve',
      auto_executed: true,
      synthesis: 'Fund it.',
    });
    expect((await store.get('application', application.id))?.status).toBe('auto_approved');
  });

  it('records a human decision that agrees with the council', async () => {
    const application = await submit();
    const evaluated = await app.request(`/api/applications/${application.id}/evaluate`, { method: 'POST' });
    const { decision } = await evaluated.json() as { decision: CouncilDecision };

    const res = await postJson(`/api/decisions/${decision.id}/human-decision`, {
      decision: 'approved',
      rationale: 'Matches the council.',
      reviewer: 'reviewer-1',
    });

    expect(res.status).toBe(200);
    const body = await res.json() as { decision: CouncilDecision; application: Application; overridden: boolean };
    expect(body.overridden).toBe(false);
    expect(body.application.status).toBe('approved');
    expect(body.decision.human_decision).toMatchObject({ decision: 'approved', reviewer: 'reviewer-1' });
  });

  it('refuses an outcome for an application that was never approved', async () => {
    const application = await submit();

    const res = await postJson(`/api/applications/${application.id}/outcome`, { outcome: 'success' });

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: `Application ${application.id} is pending; outcomes apply only to approved grants`,
    });
  });

  it('refuses to re-run a human-decided application', async () => {
    await store.put('application', 'app-1', makeApplication({ status: 'approved' }));

    const res = await app.request('/api/applications/app-1/evaluate', { method: 'POST' });

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: 'Illegal application status transition: approved → evaluating' });
  });
});

describe('streamed evaluation', () => {
  it('streams the council stages in order', async () => {
    const application = await submit();

    const res = await app.request(`/api/applications/${application.id}/evaluate/stream`, { method: 'POST' });

    expect(res.headers.get('Content-Type')).toContain('text/event-stream');
    const events = sseEvents(await res.text());
    expect(stageTrail(events)).toEqual(COUNCIL_TRAIL);
    expect(events.at(-1)).toMatchObject({ type: 'complete', application_id: application.id, recommendation: 'approve' });
  });

  it('finishes and persists the run after the client disconnects', async () => {
    const application = await submit();
    const gate = holdSynthesis();

    const res = await app.request(`/api/applications/${application.id}/evaluate/stream`, { method: 'POST' });
    const reader = res.body?.getReader();
    expect(reader).toBeDefined();
    await reader?.read();
    await gate.started;
    await reader?.cancel();
    gate.release();

    await vi.waitFor(async () => {
      expect((await store.get('application', application.id))?.status).toBe('auto_approved');
    });
    const decisions = await store.list('decision', (d) => d.application_id === application.id);
    expect(decisions).toHaveLength(1);
    expect(decisions[0]?.synthesis).toBe('Fund it.');
  });

  it('refuses a second evaluation of an application already in flight', async () => {
    const application = await submit();
    const gate = holdSynthesis();

    const first = app.request(`/api/applications/${application.id}/evaluate`, { method: 'POST' });
    await gate.started;
    const second = await app.request(`/api/applications/${application.id}/evaluate`, { method: 'POST' });
    gate.release();

    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({ error: 'Evaluation already in progress' });
    expect((await first).status).toBe(200);
  });

  it('parses raw text then streams the council run', async () => {
    const res = await postJson('/api/applications/intake/stream', {
      text: 'Solar Grid Mapper\nRooftop panel maps for co-ops.',
    });

    const events = sseEvents(await res.text());
    expect(stageTrail(events)).toEqual(['parsing:started', 'parsing:complete', ...COUNCIL_TRAIL]);
    expect(events[1]).toMatchObject({ type: 'stage', stage: 'parsing', data: { title: 'Solar Grid Mapper' } });
  });
});

describe('service endpoints', () => {
  it('reports store health', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    const body = await res.json() as { store_ok: boolean; shutting_down: boolean };
    expect(body.store_ok).toBe(true);
    expect(body.shutting_down).toBe(false);
  });

  it('echoes a caller-supplied request id', async () => {
    const res = await app.request('/health', { headers: { 'X-Request-ID': 'trace-7' } });
    expect(res.headers.get('X-Request-ID')).toBe('trace-7');
  });

  it('returns JSON 404 for unknown routes', async () => {
    const res = await app.request('/api/unknown');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
