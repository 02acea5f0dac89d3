import { vi, describe, it, expect, beforeEach } from 'vitest';
import type { InferenceRequest } from '../lib/llm.js';

const mockInvokeStructured = vi.hoisted(() => vi.fn<(request: InferenceRequest, schema: unknown) => Promise<unknown>>());
vi.mock('../lib/llm.js', () => ({
  gateway: { invoke: vi.fn(), invokeStructured: mockInvokeStructured },
  SYNTHESIS_MODEL: 'mock-synthesis',
  INTAKE_MODEL: 'mock-intake',
}));
vi.mock('../lib/store.js', async () => {
  const { MemoryRecordStore } = await import('../lib/record-store.js');
  return { store: new MemoryRecordStore() };
});

import { store } from '../lib/store.js';
import { MemoryRecordStore } from '../lib/record-store.js';
import {
  bootstrapAgent,
  disagreesWithVerdict,
  learnFromOutcome,
  learnFromOverride,
  predictedCorrectly,
  type HistoricalApplication,
} from '../agents/learning.js';
import { LearningOutputSchema } from '../agents/schemas/council-schemas.js';
import logger from '../lib/logger.js';
import type { CouncilDecision } from '../agents/types.js';
import { ROSTER, makeApplication, makeEvaluation, makeObservation } from './council-fixtures.js';

function learned(...patterns: string[]) {
  return LearningOutputSchema.parse({
    observations: patterns.map((pattern) => ({ pattern, tags: ['Delivery'], confidence: 0.6 })),
  });
}

function makeDecision(): CouncilDecision {
  return {
    id: 'decision-1',
    application_id: 'app-1',
    evaluations: [
      makeEvaluation('technical', 0.9, 'approve'),
      makeEvaluation('ecosystem', 0.5, 'needs_review'),
      makeEvaluation('budget', 0.2, 'reject'),
      makeEvaluation('impact', 0.85, 'approve'),
    ],
    average_score: 0.6125,
    average_confidence: 0.85,
    score_variance: 0.08,
    recommendation: 'needs_review',
    auto_executed: false,
    requires_human_review: true,
    review_reasons: ['evaluators did not reach unanimous recommendation'],
    synthesis: 'Split council.',
    applicant_feedback: 'Thank you for your application.',
    deliberation: { rounds_run: 1, revisions_per_round: [0], stopped_early: true, history: [] },
    created_at: '2026-01-10T00:00:00.000Z',
    decided_at: '2026-01-10T00:00:00.000Z',
  };
}

beforeEach(() => {
  mockInvokeStructured.mockReset();
  if (store instanceof MemoryRecordStore) store.clear();
});

describe('disagreesWithVerdict', () => {
  it('treats needs_review as disagreeing with either verdict', () => {
    expect(disagreesWithVerdict('needs_review', 'approved')).toBe(true);
    expect(disagreesWithVerdict('needs_review', 'rejected')).toBe(true);
    expect(disagreesWithVerdict('approve', 'approved')).toBe(false);
    expect(disagreesWithVerdict('reject', 'approved')).toBe(true);
  });
});

describe('predictedCorrectly', () => {
  it('counts approve-then-success and non-approve-then-failure as correct', () => {
    expect(predictedCorrectly('approve', 'success')).toBe(true);
    expect(predictedCorrectly('reject', 'failure')).toBe(true);
    expect(predictedCorrectly('needs_review', 'failure')).toBe(true);
    expect(predictedCorrectly('approve', 'failure')).toBe(false);
  });
});

describe('learnFromOverride', () => {
  it('asks only the agents who disagreed with the human and stores drafts', async () => {
    mockInvokeStructured.mockResolvedValue(learned('Reviewers value maintained releases.'));

    const observations = await learnFromOverride(
      makeDecision(), makeApplication(), ROSTER, 'approved', 'Strong maintainer history.', logger,
    );

    expect(mockInvokeStructured).toHaveBeenCalledTimes(2);
    expect(observations.map((o) => o.agent_id).sort()).toEqual(['budget', 'ecosystem']);
    for (const observation of observations) {
      expect(observation.status).toBe('draft');
      expect(observation.source).toBe('override');
      expect(observation.evidence).toEqual(['app-1']);
      expect(observation.tags).toEqual(['delivery']);
    }
    expect(await store.list('observation')).toHaveLength(2);
  });

  it('logs and skips an agent whose reflection fails', async () => {
    mockInvokeStructured
      .mockRejectedValueOnce(new Error('upstream down'))
      .mockResolvedValueOnce(learned('Check audit history.'));

    const observations = await learnFromOverride(
      makeDecision(), makeApplication(), ROSTER, 'approved', 'Looks fine.', logger,
    );
    expect(observations).toHaveLength(1);
  });
});

describe('learnFromOutcome', () => {
  it('asks every agent and tags drafts with the application domain', async () => {
    mockInvokeStructured.mockResolvedValue(learned('Teams with prior releases deliver.'));

    const observations = await learnFromOutcome(
      makeDecision(), makeApplication({ domain_tags: ['infrastructure'] }), ROSTER, 'success', 'Shipped on time.', logger,
    );

    expect(mockInvokeStructured).toHaveBeenCalledTimes(4);
    expect(observations).toHaveLength(4);
    expect(observations[0]?.tags).toEqual(['delivery', 'infrastructure']);
    expect(observations[0]?.source).toBe('outcome');
  });

  it('frames the prompt by whether the agent called it right', async () => {
    mockInvokeStructured.mockResolvedValue(learned());

    await learnFromOutcome(makeDecision(), makeApplication(), ROSTER, 'failure', '', logger);

    const prompts = mockInvokeStructured.mock.calls.map(([request]) => request.messages[0]?.content ?? '');
    expect(prompts[0]).toContain('The outcome contradicts your evaluation.');
    expect(prompts[2]).toContain('The outcome corroborates your evaluation.');
  });
});

describe('bootstrapAgent', () => {
  const items: HistoricalApplication[] = [1, 2, 3].map((n) => ({
    id: `hist-${n}`,
    title: `Past grant ${n}`,
    team_name: 'Past Team',
    summary: '',
    funding_requested: 10_000,
    outcome: 'success',
    outcome_notes: '',
    domain_tags: ['education'],
  }));

  it('stops once the agent owns the target number of observations', async () => {
    await store.put('observation', 'existing', makeObservation('existing', { agent_id: 'impact' }));
    mockInvokeStructured.mockResolvedValue(learned('one', 'two'));

    const impact = ROSTER[3];
    if (!impact) throw new Error('fixture roster is missing impact');
    const created = await bootstrapAgent(impact, items, logger, 4);

    expect(created.map((o) => o.pattern)).toEqual(['one', 'two', 'one']);
    expect(mockInvokeStructured).toHaveBeenCalledTimes(2);
    expect(created.every((o) => o.source === 'bootstrap')).toBe(true);
    expect(created[0]?.evidence).toEqual(['hist-1']);
    expect(created[2]?.evidence).toEqual(['hist-2']);
  });
});
