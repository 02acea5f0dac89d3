import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Application } from './types.js';

// ─── Domain tags ─────────────────────────────────────────────────────

const DomainTagRulesSchema = z.object({
  rules: z.array(z.object({
    tag: z.string().min(1),
    keywords: z.array(z.string().min(1)).min(1),
  })),
});

export type DomainTagRule = z.infer<typeof DomainTagRulesSchema>['rules'][number];

const RULES_PATH = fileURLToPath(new URL('../../config/domain-tags.json', import.meta.url));

let cachedRules: DomainTagRule[] | null = null;

function getDomainTagRules(): DomainTagRule[] {
  if (!cachedRules) {
    const raw: unknown = JSON.parse(readFileSync(RULES_PATH, 'utf8'));
    cachedRules = DomainTagRulesSchema.parse(raw).rules;
  }
  return cachedRules;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Tags describing what an application is about, from keyword rules matched
 * on whole words of its title, summary, description and technical approach.
 */
export function deriveDomainTags(
  application: Pick<Application, 'title' | 'summary' | 'description' | 'technical_approach'>,
  rules: DomainTagRule[] = getDomainTagRules(),
): string[] {
  const text = [
    application.title,
    application.summary,
    application.description,
    application.technical_approach,
  ].join(' ').toLowerCase();

  const tags: string[] = [];
  for (const rule of rules) {
    const hit = rule.keywords.some((keyword) => (
      new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}\\b`).test(text)
    ));
    if (hit && !tags.includes(rule.tag)) tags.push(rule.tag);
  }
  return tags;
}

// ─── Milestones ──────────────────────────────────────────────────────

export function milestonePercentageTotal(application: Pick<Application, 'milestones'>): number {
  return application.milestones.reduce((sum, m) => sum + m.funding_percentage, 0);
}

/**
 * Advisory note for budget-focused agents when milestone percentages do not
 * add up to 100. Returns null when they do or when there are no milestones.
 */
export function milestoneAdvisory(application: Pick<Application, 'milestones'>): string | null {
  if (application.milestones.length === 0) return null;
  const total = milestonePercentageTotal(application);
  if (Math.abs(total - 100) < 1e-6) return null;
  return `Note: milestone funding percentages sum to ${formatNumber(total)}%, not 100%.`;
}

// ─── Formatting ──────────────────────────────────────────────────────

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function formatMoney(amount: number, currency = 'USD'): string {
  const rounded = amount.toLocaleString('en-US', { maximumFractionDigits: 2 });
  return currency.toUpperCase() === 'USD' ? `$${rounded}` : `${rounded} ${currency}`;
}

/** Markdown rendering of an application for agent prompts. Empty sections are omitted. */
export function formatApplication(application: Application): string {
  const lines: string[] = [];

  lines.push(`# ${application.title}`);
  lines.push(`**Team:** ${application.team_name}`);
  lines.push(`**Funding Requested:** ${formatMoney(application.funding_requested, application.currency)}`);
  if (application.domain_tags.length > 0) {
    lines.push(`**Domains:** ${application.domain_tags.join(', ')}`);
  }
  lines.push('');

  const prose: Array<[string, string]> = [
    ['Summary', application.summary],
    ['Description', application.description],
    ['Problem Statement', application.problem_statement],
    ['Proposed Solution', application.proposed_solution],
    ['Technical Approach', application.technical_approach],
  ];
  for (const [heading, body] of prose) {
    if (!body.trim()) continue;
    lines.push(`## ${heading}`, body, '');
  }

  if (application.team_members.length > 0) {
    lines.push('## Team Members');
    for (const member of application.team_members) {
      lines.push(`- **${member.name}** (${member.role})${member.bio ? `: ${member.bio}` : ''}`);
    }
    lines.push('');
  }

  if (application.prior_work.trim()) {
    lines.push('## Prior Work & Experience', application.prior_work, '');
  }

  if (application.budget_breakdown.length > 0) {
    lines.push('## Budget Breakdown');
    for (const item of application.budget_breakdown) {
      const desc = item.description ? ` - ${item.description}` : '';
      lines.push(`- **${item.category}**: ${formatMoney(item.amount, application.currency)}${desc}`);
    }
    lines.push('');
  }

  if (application.milestones.length > 0) {
    lines.push('## Milestones');
    application.milestones.forEach((milestone, i) => {
      lines.push(`### Milestone ${i + 1}: ${milestone.title} (${formatNumber(milestone.funding_percentage)}%)`);
      if (milestone.description) lines.push(milestone.description);
    });
    lines.push('');
  }

  const links = Object.entries(application.links).filter(([, url]) => Boolean(url));
  if (links.length > 0) {
    lines.push('## Links');
    for (const [label, url] of links) {
      lines.push(`- ${label}: ${url}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
