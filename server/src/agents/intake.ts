/**
 * Intake: turns a structured submission or raw application text into an
 * Application. Raw text goes through one extraction call; if that fails a
 * minimal application is built from the text itself.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { gateway, INTAKE_MODEL } from '../lib/llm.js';
import { errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { deriveDomainTags } from './application-format.js';
import type { Application } from './types.js';

const MAX_RAW_TEXT = 30_000;

const text = (max: number) => z.string().max(max).optional().default('');
const money = z.coerce.number().finite().nonnegative();

const TeamMemberSchema = z.object({
  name: z.string().min(1).max(200),
  role: z.string().max(200).optional().default(''),
  wallet_address: z.string().max(200).optional(),
  bio: z.string().max(2_000).optional(),
});

const BudgetItemSchema = z.object({
  category: z.string().max(200).optional().default('General'),
  description: text(2_000),
  amount: money,
});

const MilestoneSchema = z.object({
  title: z.string().min(1).max(300),
  description: text(5_000),
  funding_percentage: z.coerce.number().finite().min(0).max(100).optional().default(0),
});

export const ApplicationSubmissionSchema = z.object({
  title: z.string().min(1).max(300),
  summary: text(5_000),
  description: text(50_000),
  team_name: z.string().min(1).max(200),
  team_id: z.string().max(100).optional(),
  team_members: z.array(TeamMemberSchema).max(50).optional().default([]),
  problem_statement: text(20_000),
  proposed_solution: text(20_000),
  technical_approach: text(20_000),
  prior_work: text(20_000),
  funding_requested: money,
  currency: z.string().min(1).max(10).optional().default('USD'),
  budget_breakdown: z.array(BudgetItemSchema).max(100).optional().default([]),
  milestones: z.array(MilestoneSchema).max(50).optional().default([]),
  domain_tags: z.array(z.string().min(1).max(50)).max(20).optional().default([]),
  links: z.object({
    website: z.string().max(500).optional(),
    github: z.string().max(500).optional(),
    demo: z.string().max(500).optional(),
  }).optional().default({}),
});

export type ApplicationSubmission = z.infer<typeof ApplicationSubmissionSchema>;

/** New pending application; submitted tags are kept and derived ones added. */
export function applicationFromSubmission(
  submission: ApplicationSubmission,
  now: Date = new Date(),
): Application {
  const derived = deriveDomainTags(submission);
  const tags = [...new Set([...submission.domain_tags.map((t) => t.toLowerCase()), ...derived])];
  const timestamp = now.toISOString();
  return {
    id: randomUUID(),
    title: submission.title,
    summary: submission.summary,
    description: submission.description,
    team_name: submission.team_name,
    ...(submission.team_id ? { team_id: submission.team_id } : {}),
    team_members: submission.team_members,
    problem_statement: submission.problem_statement,
    proposed_solution: submission.proposed_solution,
    technical_approach: submission.technical_approach,
    prior_work: submission.prior_work,
    funding_requested: submission.funding_requested,
    currency: submission.currency.toUpperCase(),
    budget_breakdown: submission.budget_breakdown,
    milestones: submission.milestones,
    domain_tags: tags,
    links: submission.links,
    submitted_at: timestamp,
    status: 'pending',
    updated_at: timestamp,
  };
}

// ─── Freeform ────────────────────────────────────────────────────────

/**
 * Extraction output is permissive: anything missing falls back to an empty
 * value, and text and lists are clipped to the submission limits so one
 * oversized field does not void the rest.
 */
const clip = (max: number, fallback = '') => z.string().nullish().transform((v) => (v || fallback).slice(0, max));
const clipOptional = (max: number) => z.string().nullish().transform((v) => (v ? v.slice(0, max) : undefined));
const amount = z.coerce.number().finite().catch(0);

const ExtractedApplicationSchema = z.object({
  title: clip(300, 'Untitled Application'),
  summary: clip(5_000),
  team_name: clip(200, 'Unknown Team'),
  team_members: z.array(z.object({
    name: clip(200, 'Unknown'),
    role: clip(200, 'Team Member'),
    wallet_address: clipOptional(200),
    bio: clipOptional(2_000),
  })).optional().default([]).transform((items) => items.slice(0, 50)),
  problem_statement: clip(20_000),
  proposed_solution: clip(20_000),
  technical_approach: clip(20_000),
  prior_work: clip(20_000),
  funding_requested: amount,
  currency: clip(10, 'USD'),
  budget_breakdown: z.array(z.object({
    category: clip(200, 'General'),
    description: clip(2_000),
    amount,
  })).optional().default([]).transform((items) => items.slice(0, 100)),
  milestones: z.array(z.object({
    title: clip(300, 'Milestone'),
    description: clip(5_000),
    funding_percentage: amount,
  })).optional().default([]).transform((items) => items.slice(0, 50)),
  website: clipOptional(500),
  github: clipOptional(500),
  demo: clipOptional(500),
});

const EXTRACTION_PROMPT = `Extract structured information from the grant application below. Respond only with JSON of this shape; use null or empty values for anything not mentioned:
{
  "title": "project title",
  "summary": "one paragraph summary",
  "team_name": "team or organization name",
  "team_members": [{ "name": "", "role": "", "wallet_address": null, "bio": null }],
  "problem_statement": "", "proposed_solution": "", "technical_approach": "", "prior_work": "",
  "funding_requested": 0, "currency": "USD",
  "budget_breakdown": [{ "category": "", "description": "", "amount": 0 }],
  "milestones": [{ "title": "", "description": "", "funding_percentage": 0 }],
  "website": null, "github": null, "demo": null
}
Include every team member, budget item and milestone mentioned.`;

/** Title from the first line and the first dollar amount; used when extraction fails. */
export function basicParse(rawText: string): ApplicationSubmission {
  const firstLine = rawText.trim().split('\n')[0]?.trim() ?? '';
  const fundingMatch = /\$\s?([\d,]+(?:\.\d{1,2})?)/.exec(rawText);
  return ApplicationSubmissionSchema.parse({
    title: (firstLine || 'Untitled Application').slice(0, 100),
    team_name: 'Unknown Team',
    description: rawText.slice(0, 50_000),
    funding_requested: fundingMatch?.[1] ? Number(fundingMatch[1].replace(/,/g, '')) : 0,
  });
}

export async function parseFreeformApplication(rawText: string, log: Logger): Promise<Application> {
  const clipped = rawText.slice(0, MAX_RAW_TEXT);
  if (!clipped.trim()) {
    throw new Error('No application text provided');
  }

  let submission: ApplicationSubmission;
  try {
    const extracted = await gateway.invokeStructured({
      model: INTAKE_MODEL,
      system: 'You are an expert at extracting structured data from grant applications.',
      messages: [{ role: 'user', content: `${EXTRACTION_PROMPT}\n\nAPPLICATION TEXT:\n${clipped}` }],
      temperature: 0.3,
      max_tokens: 4096,
    }, ExtractedApplicationSchema);

    submission = ApplicationSubmissionSchema.parse({
      ...extracted,
      description: clipped.slice(0, 2_000),
      funding_requested: Math.max(0, extracted.funding_requested),
      budget_breakdown: extracted.budget_breakdown.map((b) => ({ ...b, amount: Math.max(0, b.amount) })),
      milestones: extracted.milestones.map((m) => ({
        ...m,
        funding_percentage: Math.min(100, Math.max(0, m.funding_percentage)),
      })),
      links: {
        ...(extracted.website ? { website: extracted.website } : {}),
        ...(extracted.github ? { github: extracted.github } : {}),
        ...(extracted.demo ? { demo: extracted.demo } : {}),
      },
    });
  } catch (err) {
    log.warn({ error: errorMessage(err) }, 'Freeform extraction failed, using basic parse');
    submission = basicParse(clipped);
  }

  return applicationFromSubmission(submission);
}
