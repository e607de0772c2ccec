import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createRepo, type Repo } from '../db/repo.js';
import { createLogger } from '../lib/logger.js';
import type { CharacterInput } from '../types.js';
import { createAlignmentService } from './alignmentService.js';
import { createTeamService, teamStats, type TeamService } from './teamService.js';

const logger = createLogger('silent');

async function seed(repo: Repo, id: string, name: string, extra: Partial<CharacterInput> = {}) {
  await repo.upsertCharacter({ id, name, affiliations: [], masters: [], ...extra });
}

describe('teamService', () => {
  let repo: Repo;
  let teams: TeamService;

  beforeEach(async () => {
    repo = createRepo({ provider: 'local' });
    teams = createTeamService({ repo, alignment: createAlignmentService({ repo }), logger, maxAttempts: 3 });
    for (const [id, name] of [['1', 'Luke'], ['2', 'Leia'], ['3', 'Han'], ['4', 'Chewbacca'], ['5', 'Lando'], ['6', 'Wedge']]) {
      await seed(repo, id, name);
    }
    await seed(repo, '66', 'Palpatine', { affiliations: ['Galactic Empire'] });
    await seed(repo, '67', 'Anakin', { masters: ['66'] });
  });

  async function teamWith(memberIds: string[]) {
    const team = await teams.createTeam({ name: 'Rebels', ownerId: 'user-1' });
    for (const id of memberIds) {
      const result = await teams.addMember(team.id, id);
      expect(result.ok).toBe(true);
    }
    return team.id;
  }

  it('adds a member and bumps the stored version', async () => {
    const teamId = await teamWith([]);
    const result = await teams.addMember(teamId, '1');
    expect(result.ok && result.team.members).toEqual(['1']);
    expect(result.ok && result.team.version).toBe(1);
    expect((await teams.getTeam(teamId)).members).toEqual(['1']);
  });

  it('reports a missing team', async () => {
    const result = await teams.addMember('nope', '1');
    expect(!result.ok && result.error.code).toBe('team_not_found');
  });

  it('reports a missing character', async () => {
    const teamId = await teamWith([]);
    const result = await teams.addMember(teamId, '999');
    expect(!result.ok && result.error.code).toBe('character_not_found');
  });

  it('rejects a character whose master is evil', async () => {
    const teamId = await teamWith([]);
    const result = await teams.addMember(teamId, '67');
    expect(!result.ok && result.error.code).toBe('evil_character_rejected');
    expect((await teams.getTeam(teamId)).members).toEqual([]);
  });

  it('lets exactly one of two racing adds take the fifth seat', async () => {
    const teamId = await teamWith(['1', '2', '3', '4']);

    const [first, second] = await Promise.all([teams.addMember(teamId, '5'), teams.addMember(teamId, '6')]);

    const outcomes = [first, second].map((r) => (r.ok ? 'ok' : r.error.code)).sort();
    expect(outcomes).toEqual(['capacity_exceeded', 'ok']);
    const stored = await teams.getTeam(teamId);
    expect(stored.members).toHaveLength(5);
    expect(stored.members.slice(0, 4)).toEqual(['1', '2', '3', '4']);
  });

  it('gives up with concurrent_modification after repeated version conflicts', async () => {
    const teamId = await teamWith([]);
    const cas = vi.spyOn(repo, 'compareAndSetMembers').mockResolvedValue(null);

    const result = await teams.addMember(teamId, '1');

    expect(!result.ok && result.error.code).toBe('concurrent_modification');
    expect(cas).toHaveBeenCalledTimes(3);
  });

  it('removes a member', async () => {
    const teamId = await teamWith(['1', '2']);
    const result = await teams.removeMember(teamId, '1');
    expect(result.ok && result.team.members).toEqual(['2']);
  });

  it('fails to remove a non-member', async () => {
    const teamId = await teamWith(['1']);
    const result = await teams.removeMember(teamId, '2');
    expect(!result.ok && result.error.code).toBe('member_not_found');
  });

  it('keeps a member whose affiliation turns evil after joining', async () => {
    const teamId = await teamWith(['1']);
    await seed(repo, '1', 'Luke', { affiliations: ['First Order'] });
    expect((await teams.getTeam(teamId)).members).toEqual(['1']);
  });

  it('builds a detail view with member summaries', async () => {
    await seed(repo, '1', 'Luke', { species: 'human' });
    const teamId = await teamWith(['1', '2', '3', '4', '5']);
    const detail = await teams.getTeamDetail(teamId);
    expect(detail.memberCount).toBe(5);
    expect(detail.maxMembers).toBe(5);
    expect(detail.isFull).toBe(true);
    expect(detail.memberDetails[0]).toEqual({ id: '1', name: 'Luke', species: 'human', imageUrl: undefined });
  });

  it('counts members by species and homeworld', async () => {
    await seed(repo, '1', 'Luke', { species: 'human', homeworld: 'tatooine' });
    await seed(repo, '2', 'Leia', { species: 'human', homeworld: 'alderaan' });
    await seed(repo, '3', 'Han', { species: 'human', homeworld: '' });
    const teamId = await teamWith(['1', '2', '3', '4']);

    expect((await teams.getTeamDetail(teamId)).teamStats).toEqual({
      speciesDistribution: { human: 3, Unknown: 1 },
      homeworldDistribution: { tatooine: 1, alderaan: 1, Unknown: 2 },
    });
  });

  it('gives an empty team empty distributions', () => {
    expect(teamStats([])).toEqual({ speciesDistribution: {}, homeworldDistribution: {} });
  });

  it('drops a character from every team listing it', async () => {
    const a = await teamWith(['1', '2']);
    const b = await teams.createTeam({ name: 'Smugglers' });
    await teams.addMember(b.id, '3');
    const c = await teams.createTeam({ name: 'Pilots' });
    await teams.addMember(c.id, '1');

    expect(await teams.removeCharacterFromTeams('1')).toBe(2);
    expect((await teams.getTeam(a)).members).toEqual(['2']);
    expect((await teams.getTeam(b.id)).members).toEqual(['3']);
    expect((await teams.getTeam(c.id)).members).toEqual([]);
  });

  it('refuses a duplicate team name', async () => {
    await teams.createTeam({ name: 'Rebels' });
    await expect(teams.createTeam({ name: 'Rebels' })).rejects.toMatchObject({ code: 'team_name_taken' });
  });

  it('renames and deletes teams', async () => {
    const teamId = await teamWith([]);
    expect((await teams.renameTeam(teamId, 'Alliance')).name).toBe('Alliance');
    await teams.deleteTeam(teamId);
    await expect(teams.getTeam(teamId)).rejects.toMatchObject({ code: 'team_not_found' });
    await expect(teams.deleteTeam(teamId)).rejects.toMatchObject({ code: 'team_not_found' });
  });

  it('lists teams by owner', async () => {
    await teams.createTeam({ name: 'Mine', ownerId: 'u1' });
    await teams.createTeam({ name: 'Theirs', ownerId: 'u2' });
    expect((await teams.listTeams({ ownerId: 'u1' })).map((t) => t.name)).toEqual(['Mine']);
  });

  it('lists teams with member count and fullness', async () => {
    const teamId = await teamWith(['1', '2', '3', '4', '5']);
    await teams.createTeam({ name: 'Empty' });
    const byName = new Map((await teams.listTeams()).map((t) => [t.name, t]));
    expect(byName.get('Rebels')).toMatchObject({ id: teamId, memberCount: 5, isFull: true });
    expect(byName.get('Empty')).toMatchObject({ memberCount: 0, isFull: false });
  });
});
