import { vi, describe, it, expect, beforeEach } from 'vitest';

vi.mock('../lib/store.js', async () => {
  const { MemoryRecordStore } = await import('../lib/record-store.js');
  return { store: new MemoryRecordStore() };
});

import { store } from '../lib/store.js';
import { MemoryRecordStore } from '../lib/record-store.js';
import {
  findTeamForApplication,
  formatTeamSummary,
  recordTeamDecision,
  recordTeamOutcome,
  teamStats,
  upsertTeamForApplication,
} from '../agents/teams.js';
import { makeApplication } from './council-fixtures.js';

const NOW = new Date('2026-02-01T00:00:00.000Z');

beforeEach(() => {
  if (store instanceof MemoryRecordStore) store.clear();
});

describe('upsertTeamForApplication', () => {
  it('creates a team on first contact', async () => {
    const team = await upsertTeamForApplication(makeApplication({
      team_members: [{ name: 'Ada', role: 'Lead', wallet_address: '0xABC' }],
    }), NOW);

    expect(team).toMatchObject({
      canonical_name: 'Lantern Labs',
      aliases: [],
      wallet_addresses: ['0xABC'],
      application_ids: ['app-1'],
      created_at: '2026-02-01T00:00:00.000Z',
    });
    expect(await store.get('team', team.id)).toEqual(team);
  });

  it('uses the submitted team id for a new team', async () => {
    const team = await upsertTeamForApplication(makeApplication({ team_id: 'team-lantern' }), NOW);
    expect(team.id).toBe('team-lantern');
  });

  it('matches a returning team by wallet and records the new name as an alias', async () => {
    const first = await upsertTeamForApplication(makeApplication({
      team_members: [{ name: 'Ada', role: 'Lead', wallet_address: '0xABC' }],
    }), NOW);

    const second = await upsertTeamForApplication(makeApplication({
      id: 'app-2',
      team_name: 'Lantern Collective',
      team_members: [{ name: 'Ada', role: 'Lead', wallet_address: '0xabc' }],
    }), NOW);

    expect(second.id).toBe(first.id);
    expect(second.canonical_name).toBe('Lantern Labs');
    expect(second.aliases).toEqual(['Lantern Collective']);
    expect(second.wallet_addresses).toEqual(['0xABC']);
    expect(second.application_ids).toEqual(['app-1', 'app-2']);
  });

  it('finds a returning team by name case-insensitively', async () => {
    await upsertTeamForApplication(makeApplication(), NOW);
    await upsertTeamForApplication(makeApplication({ id: 'app-2', team_name: 'lantern labs' }), NOW);

    const found = await findTeamForApplication(makeApplication({ id: 'app-3', team_name: 'LANTERN LABS' }));
    expect(found?.application_ids).toEqual(['app-1', 'app-2']);
    expect(found?.aliases).toEqual([]);
  });
});

describe('team history', () => {
  it('recomputes stats from decisions and outcomes', async () => {
    const team = await upsertTeamForApplication(makeApplication(), NOW);
    await recordTeamDecision(team.id, 'app-1', 'approved', NOW);
    await recordTeamDecision(team.id, 'app-2', 'rejected', NOW);
    await recordTeamDecision(team.id, 'app-2', 'approved', NOW);
    const updated = await recordTeamOutcome(team.id, 'app-1', 'success', NOW);

    expect(updated && teamStats(updated)).toEqual({
      applications: 2,
      approved: 2,
      rejected: 0,
      successful_grants: 1,
      failed_grants: 0,
    });
  });

  it('summarizes prior history without the current application', async () => {
    const team = await upsertTeamForApplication(makeApplication(), NOW);
    await recordTeamDecision(team.id, 'app-1', 'approved', NOW);
    await recordTeamOutcome(team.id, 'app-1', 'failure', NOW);
    const current = await upsertTeamForApplication(makeApplication({ id: 'app-2' }), NOW);

    expect(formatTeamSummary(current, 'app-2')).toBe([
      'This team (Lantern Labs) has applied before:',
      '- Previous applications: 1',
      '- Approved: 1, rejected: 0',
      '- Successful grants: 0',
      '- Failed grants: 1',
    ].join('\n'));
    expect(formatTeamSummary(team, 'app-1')).toBeNull();
  });

  it('ignores updates for unknown teams', async () => {
    expect(await recordTeamDecision('missing', 'app-1', 'approved', NOW)).toBeNull();
  });
});
