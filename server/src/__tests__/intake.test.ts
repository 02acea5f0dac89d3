import { vi, describe, it, expect, beforeEach } from 'vitest';
import type { z } from 'zod';
import type { InferenceRequest } from '../lib/llm.js';

const mockInvokeStructured = vi.hoisted(() => vi.fn<(request: InferenceRequest, schema: z.ZodTypeAny) => Promise<unknown>>());
vi.mock('../lib/llm.js', () => ({
  gateway: { invoke: vi.fn(), invokeStructured: mockInvokeStructured },
  SYNTHESIS_MODEL: 'mock-synthesis',
  INTAKE_MODEL: 'mock-intake',
}));

import {
  ApplicationSubmissionSchema,
  applicationFromSubmission,
  basicParse,
  parseFreeformApplication,
} from '../agents/intake.js';
import logger from '../lib/logger.js';

const RAW_TEXT = 'Solar Grid Mapper\nWe map rooftop panels for local co-ops and request $12,500 over six months.';

beforeEach(() => {
  mockInvokeStructured.mockReset();
});

describe('basicParse', () => {
  it('takes the title from the first line and the first dollar amount', () => {
    const submission = basicParse(RAW_TEXT);
    expect(submission.title).toBe('Solar Grid Mapper');
    expect(submission.funding_requested).toBe(12500);
    expect(submission.team_name).toBe('Unknown Team');
    expect(submission.description).toBe(RAW_TEXT);
  });

  it('defaults funding to zero when no amount is present', () => {
    expect(basicParse('Untitled idea').funding_requested).toBe(0);
  });
});

describe('applicationFromSubmission', () => {
  it('merges lowercased submitted tags with derived ones', () => {
    const submission = ApplicationSubmissionSchema.parse({
      title: 'Indexer Kit',
      summary: 'An indexer for lending markets',
      team_name: 'Kit Collective',
      funding_requested: 5000,
      currency: 'usd',
      domain_tags: ['DeFi'],
    });

    const application = applicationFromSubmission(submission, new Date('2026-03-01T12:00:00.000Z'));

    expect(application.domain_tags).toEqual(['defi', 'infrastructure']);
    expect(application.currency).toBe('USD');
    expect(application.status).toBe('pending');
    expect(application.submitted_at).toBe('2026-03-01T12:00:00.000Z');
    expect(application.updated_at).toBe('2026-03-01T12:00:00.000Z');
    expect(application).not.toHaveProperty('team_id');
  });
});

describe('parseFreeformApplication', () => {
  it('rejects empty text', async () => {
    await expect(parseFreeformApplication('   ', logger)).rejects.toThrow('No application text provided');
    expect(mockInvokeStructured).not.toHaveBeenCalled();
  });

  it('normalizes the extracted fields', async () => {
    const raw = 'Mesh Relay: an open source relay network for rural towns.';
    mockInvokeStructured.mockImplementation(async (_request, schema) => schema.parse({
      title: 'Mesh Relay',
      summary: 'Relay network',
      team_name: 'Relay Co',
      team_members: [{ name: 'Bo', role: null }],
      funding_requested: '8000',
      currency: 'usd',
      budget_breakdown: [{ category: null, description: 'Hosting', amount: -5 }],
      milestones: [{ title: 'Beta', description: null, funding_percentage: 140 }],
      website: null,
      github: 'https://github.com/relay/mesh',
      demo: null,
    }));

    const application = await parseFreeformApplication(raw, logger);

    expect(mockInvokeStructured.mock.calls[0]?.[0].model).toBe('mock-intake');
    expect(application.title).toBe('Mesh Relay');
    expect(application.team_name).toBe('Relay Co');
    expect(application.team_members[0]).toMatchObject({ name: 'Bo', role: 'Team Member' });
    expect(application.funding_requested).toBe(8000);
    expect(application.currency).toBe('USD');
    expect(application.budget_breakdown).toEqual([{ category: 'General', description: 'Hosting', amount: 0 }]);
    expect(application.milestones).toEqual([{ title: 'Beta', description: '', funding_percentage: 100 }]);
    expect(application.links).toEqual({ github: 'https://github.com/relay/mesh' });
    expect(application.description).toBe(raw);
    expect(application.domain_tags).toEqual(['public-goods']);
  });

  it('clips oversized extracted fields instead of discarding the extraction', async () => {
    mockInvokeStructured.mockImplementation(async (_request, schema) => schema.parse({
      title: 'T'.repeat(400),
      team_name: 'Relay Co',
      funding_requested: 9000,
      milestones: Array.from({ length: 60 }, (_, i) => ({ title: `M${i}`, funding_percentage: 1 })),
    }));

    const application = await parseFreeformApplication('Mesh Relay application text.', logger);

    expect(application.title).toBe('T'.repeat(300));
    expect(application.milestones).toHaveLength(50);
    expect(application.milestones[49]?.title).toBe('M49');
    expect(application.team_name).toBe('Relay Co');
    expect(application.funding_requested).toBe(9000);
  });

  it('falls back to the basic parse when extraction fails', async () => {
    mockInvokeStructured.mockRejectedValue(new Error('invalid JSON'));

    const application = await parseFreeformApplication(RAW_TEXT, logger);

    expect(application.title).toBe('Solar Grid Mapper');
    expect(application.funding_requested).toBe(12500);
    expect(application.team_name).toBe('Unknown Team');
    expect(application.status).toBe('pending');
  });
});
