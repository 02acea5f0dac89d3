import { randomUUID } from 'node:crypto';
import { store } from '../lib/store.js';
import type {
  Application,
  GrantOutcome,
  HumanVerdict,
  TeamProfile,
} from './types.js';

export interface TeamStats {
  applications: number;
  approved: number;
  rejected: number;
  successful_grants: number;
  failed_grants: number;
}

/** Counts are always recomputed from the per-application maps. */
export function teamStats(team: TeamProfile): TeamStats {
  const decisions = Object.values(team.decisions);
  const outcomes = Object.values(team.outcomes);
  return {
    applications: team.application_ids.length,
    approved: decisions.filter((d) => d === 'approved').length,
    rejected: decisions.filter((d) => d === 'rejected').length,
    successful_grants: outcomes.filter((o) => o === 'success').length,
    failed_grants: outcomes.filter((o) => o === 'failure').length,
  };
}

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function getTeam(id: string): Promise<TeamProfile | null> {
  return store.get('team', id);
}

export async function findTeamByName(name: string): Promise<TeamProfile | null> {
  if (!name.trim()) return null;
  const [match] = await store.list('team', (t) => (
    sameName(t.canonical_name, name) || t.aliases.some((alias) => sameName(alias, name))
  ));
  return match ?? null;
}

export async function findTeamByWallet(wallet: string): Promise<TeamProfile | null> {
  const needle = wallet.trim().toLowerCase();
  if (!needle) return null;
  const [match] = await store.list('team', (t) => t.wallet_addresses.some((w) => w.toLowerCase() === needle));
  return match ?? null;
}

/** Lookup order: explicit team id, then name or alias, then any member wallet. */
export async function findTeamForApplication(application: Application): Promise<TeamProfile | null> {
  if (application.team_id) {
    const byId = await getTeam(application.team_id);
    if (byId) return byId;
  }
  const byName = await findTeamByName(application.team_name);
  if (byName) return byName;
  for (const member of application.team_members) {
    if (!member.wallet_address) continue;
    const byWallet = await findTeamByWallet(member.wallet_address);
    if (byWallet) return byWallet;
  }
  return null;
}

function union(existing: string[], additions: string[], key: (v: string) => string = (v) => v): string[] {
  const seen = new Set(existing.map(key));
  const result = [...existing];
  for (const value of additions) {
    if (!value.trim() || seen.has(key(value))) continue;
    seen.add(key(value));
    result.push(value);
  }
  return result;
}

/**
 * Find the applicant's team or create it, then fold the application's
 * name, wallets and id into the profile. Updates are additive.
 */
export async function upsertTeamForApplication(
  application: Application,
  now: Date = new Date(),
): Promise<TeamProfile> {
  const existing = await findTeamForApplication(application);
  const wallets = application.team_members
    .map((m) => m.wallet_address)
    .filter((w): w is string => Boolean(w));
  const timestamp = now.toISOString();

  if (!existing) {
    const created: TeamProfile = {
      id: application.team_id ?? randomUUID(),
      canonical_name: application.team_name,
      aliases: [],
      wallet_addresses: union([], wallets, (w) => w.toLowerCase()),
      application_ids: [application.id],
      decisions: {},
      outcomes: {},
      created_at: timestamp,
      updated_at: timestamp,
    };
    await store.put('team', created.id, created);
    return created;
  }

  const isNewName = !sameName(existing.canonical_name, application.team_name);
  const updated: TeamProfile = {
    ...existing,
    aliases: isNewName
      ? union(existing.aliases, [application.team_name], (a) => a.toLowerCase())
      : existing.aliases,
    wallet_addresses: union(existing.wallet_addresses, wallets, (w) => w.toLowerCase()),
    application_ids: union(existing.application_ids, [application.id]),
    updated_at: timestamp,
  };
  await store.put('team', updated.id, updated);
  return updated;
}

export async function recordTeamDecision(
  teamId: string,
  applicationId: string,
  verdict: HumanVerdict,
  now: Date = new Date(),
): Promise<TeamProfile | null> {
  const team = await getTeam(teamId);
  if (!team) return null;
  const updated: TeamProfile = {
    ...team,
    application_ids: union(team.application_ids, [applicationId]),
    decisions: { ...team.decisions, [applicationId]: verdict },
    updated_at: now.toISOString(),
  };
  await store.put('team', updated.id, updated);
  return updated;
}

export async function recordTeamOutcome(
  teamId: string,
  applicationId: string,
  outcome: GrantOutcome,
  now: Date = new Date(),
): Promise<TeamProfile | null> {
  const team = await getTeam(teamId);
  if (!team) return null;
  const updated: TeamProfile = {
    ...team,
    application_ids: union(team.application_ids, [applicationId]),
    outcomes: { ...team.outcomes, [applicationId]: outcome },
    updated_at: now.toISOString(),
  };
  await store.put('team', updated.id, updated);
  return updated;
}

/**
 * Prompt text describing the team's track record, excluding the application
 * under evaluation. Null for a team with no prior history.
 */
export function formatTeamSummary(team: TeamProfile, currentApplicationId: string): string | null {
  const prior = team.application_ids.filter((id) => id !== currentApplicationId);
  if (prior.length === 0) return null;
  const history: TeamProfile = {
    ...team,
    application_ids: prior,
    decisions: Object.fromEntries(Object.entries(team.decisions).filter(([id]) => id !== currentApplicationId)),
    outcomes: Object.fromEntries(Object.entries(team.outcomes).filter(([id]) => id !== currentApplicationId)),
  };
  const stats = teamStats(history);
  return [
    `This team (${team.canonical_name}) has applied before:`,
    `- Previous applications: ${stats.applications}`,
    `- Approved: ${stats.approved}, rejected: ${stats.rejected}`,
    `- Successful grants: ${stats.successful_grants}`,
    `- Failed grants: ${stats.failed_grants}`,
  ].join('\n');
}
