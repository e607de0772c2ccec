import type { Repo, TeamFilter } from '../db/repo.js';
import { CoreError } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { Character, Team, Verdict } from '../types.js';
import type { AlignmentService } from './alignmentService.js';
import * as engine from './teamEngine.js';
import type { TeamMutation } from './teamEngine.js';

export interface TeamMemberSummary {
  id: string;
  name: string;
  species?: string;
  imageUrl?: string;
}

export interface TeamSummary extends Team {
  memberCount: number;
  isFull: boolean;
}

/** Member counts keyed by species and by homeworld; blanks count as "Unknown". */
export interface TeamStats {
  speciesDistribution: Record<string, number>;
  homeworldDistribution: Record<string, number>;
}

export interface TeamDetail extends TeamSummary {
  maxMembers: number;
  memberDetails: TeamMemberSummary[];
  teamStats: TeamStats;
}

export interface TeamServiceDeps {
  repo: Repo;
  alignment: AlignmentService;
  logger?: Logger;
  /** Compare-and-set attempts before giving up with `concurrent_modification`. */
  maxAttempts?: number;
}

const summarize = (team: Team): TeamSummary => ({
  ...team,
  memberCount: team.members.length,
  isFull: engine.isFull(team),
});

function countBy(values: string[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return Object.fromEntries(counts);
}

export function teamStats(members: readonly Pick<Character, 'species' | 'homeworld'>[]): TeamStats {
  return {
    speciesDistribution: countBy(members.map((m) => m.species || 'Unknown')),
    homeworldDistribution: countBy(members.map((m) => m.homeworld || 'Unknown')),
  };
}

const teamNotFound = (teamId: string) => new CoreError('team_not_found', `Team ${teamId} not found`);

export function createTeamService(deps: TeamServiceDeps) {
  const { repo, alignment } = deps;
  const log = (deps.logger ?? rootLogger).child({ component: 'teams' });
  const maxAttempts = Math.max(1, deps.maxAttempts ?? 5);

  /**
   * Applies `mutate` to the latest team and writes it only if nobody else
   * changed the team in between. On a lost race the team is reloaded and the
   * rules are evaluated again, so a concurrent add cannot push the team past
   * its cap.
   */
  async function applyMembershipChange(teamId: string, first: Team, mutate: (team: Team) => TeamMutation): Promise<TeamMutation> {
    let team: Team | null = first;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (!team) return { ok: false, error: teamNotFound(teamId) };

      const result = mutate(team);
      if (!result.ok) return result;

      const saved = await repo.compareAndSetMembers(teamId, team.version, result.team.members);
      if (saved) return { ok: true, team: saved };

      log.debug({ teamId, attempt, version: team.version }, 'team version conflict, retrying');
      team = await repo.getTeam(teamId);
    }
    return { ok: false, error: new CoreError('concurrent_modification', `Team ${teamId} is being modified concurrently; try again`) };
  }

  async function getTeam(teamId: string): Promise<Team> {
    const team = await repo.getTeam(teamId);
    if (!team) throw teamNotFound(teamId);
    return team;
  }

  return {
    getTeam,

    async getTeamDetail(teamId: string): Promise<TeamDetail> {
      const team = await getTeam(teamId);
      const characters = await repo.getCharacters(team.members);
      const byId = new Map<string, Character>(characters.map((c) => [c.id, c]));
      const members = team.members.flatMap((id) => {
        const c = byId.get(id);
        return c ? [c] : [];
      });
      return {
        ...summarize(team),
        maxMembers: engine.MAX_TEAM_MEMBERS,
        memberDetails: members.map((c) => ({ id: c.id, name: c.name, species: c.species, imageUrl: c.imageUrl })),
        teamStats: teamStats(members),
      };
    },

    async listTeams(filter: TeamFilter = {}): Promise<TeamSummary[]> {
      return (await repo.listTeams(filter)).map(summarize);
    },

    async createTeam(input: { name: string; ownerId?: string }): Promise<Team> {
      const team = await repo.createTeam(input);
      log.info({ teamId: team.id, name: team.name }, 'team created');
      return team;
    },

    async renameTeam(teamId: string, name: string): Promise<Team> {
      const team = await repo.renameTeam(teamId, name);
      if (!team) throw teamNotFound(teamId);
      return team;
    },

    async deleteTeam(teamId: string): Promise<void> {
      const deleted = await repo.deleteTeam(teamId);
      if (!deleted) throw teamNotFound(teamId);
      log.info({ teamId }, 'team deleted');
    },

    async addMember(teamId: string, characterId: string): Promise<TeamMutation> {
      const team = await repo.getTeam(teamId);
      if (!team) return { ok: false, error: teamNotFound(teamId) };
      const character = await repo.getCharacter(characterId);
      if (!character) return { ok: false, error: new CoreError('character_not_found', `Character ${characterId} not found`) };

      // Alignment is judged once, at insertion; later edits to the
      // character do not evict it from teams it already joined.
      const verdict: Verdict = (await alignment.verdictFor(character)).verdict;
      const result = await applyMembershipChange(teamId, team, (t) => engine.addMember(t, character, verdict));

      if (result.ok) log.info({ teamId, characterId }, 'member added');
      else log.info({ teamId, characterId, code: result.error.code }, 'member rejected');
      return result;
    },

    async removeMember(teamId: string, characterId: string): Promise<TeamMutation> {
      const team = await repo.getTeam(teamId);
      if (!team) return { ok: false, error: teamNotFound(teamId) };

      const result = await applyMembershipChange(teamId, team, (t) => engine.removeMember(t, characterId));
      if (result.ok) log.info({ teamId, characterId }, 'member removed');
      return result;
    },

    /** Drops a character from every team listing it; returns how many teams changed. */
    async removeCharacterFromTeams(characterId: string): Promise<number> {
      let removed = 0;
      for (const team of await repo.listTeams({ memberId: characterId })) {
        const result = await applyMembershipChange(team.id, team, (t) => engine.removeMember(t, characterId));
        if (result.ok) removed++;
        else if (result.error.code !== 'member_not_found' && result.error.code !== 'team_not_found') throw result.error;
      }
      return removed;
    },
  };
}

export type TeamService = ReturnType<typeof createTeamService>;
