import { CoreError } from '../lib/errors.js';
import type { Character, Team, Verdict } from '../types.js';

export const MAX_TEAM_MEMBERS = 5;

export type TeamMutation =
  | { ok: true; team: Team }
  | { ok: false; error: CoreError };

const fail = (error: CoreError): TeamMutation => ({ ok: false, error });

/**
 * Checks run cheapest first: duplicate, then capacity, then alignment.
 * A full team rejects every candidate with `capacity_exceeded`, whatever
 * their verdict. The input team is never modified.
 */
export function addMember(team: Team, character: Pick<Character, 'id' | 'name'>, verdict: Verdict, now = new Date()): TeamMutation {
  if (team.members.includes(character.id)) {
    return fail(new CoreError('duplicate_member', `${character.name} is already a member of ${team.name}.`, { details: { teamId: team.id, characterId: character.id } }));
  }
  if (team.members.length >= MAX_TEAM_MEMBERS) {
    return fail(new CoreError('capacity_exceeded', `${team.name} is full (${MAX_TEAM_MEMBERS} members max).`, { details: { teamId: team.id, size: team.members.length } }));
  }
  if (verdict === 'evil') {
    return fail(new CoreError('evil_character_rejected', `${character.name} is evil and cannot join ${team.name}.`, { details: { teamId: team.id, characterId: character.id } }));
  }
  return { ok: true, team: { ...team, members: [...team.members, character.id], updatedAt: now } };
}

export function removeMember(team: Team, characterId: string, now = new Date()): TeamMutation {
  if (!team.members.includes(characterId)) {
    return fail(new CoreError('member_not_found', `Character ${characterId} is not a member of ${team.name}.`, { details: { teamId: team.id, characterId } }));
  }
  return { ok: true, team: { ...team, members: team.members.filter((id) => id !== characterId), updatedAt: now } };
}

export function isFull(team: Pick<Team, 'members'>): boolean {
  return team.members.length >= MAX_TEAM_MEMBERS;
}
