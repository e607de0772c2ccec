// Database-agnostic repository: Local (in-memory) or MongoDB.
//
// The provider comes from config (DB_PROVIDER, see lib/config.ts):
//   - "local" : in-memory maps (no external DB required)
//   - "mongo" : MongoDB via mongoose (connect first, see db/connection.ts)

import { Types } from 'mongoose';
import { CharacterModel, type CharacterDoc } from '../models/Character.js';
import { TeamModel, type TeamDoc } from '../models/Team.js';
import { SearchIndexEntryModel, type SearchIndexEntryDoc } from '../models/SearchIndexEntry.js';
import { CoreError } from '../lib/errors.js';
import type { Character, CharacterInput, SearchIndexEntry, Team } from '../types.js';

export type Provider = 'local' | 'mongo';

export interface TeamFilter {
  ownerId?: string;
  memberId?: string;
}

export interface CharacterQuery {
  search?: string;
  limit?: number;
  offset?: number;
}

// Cleared on upsert when absent from the input, in both providers.
const OPTIONAL_CHARACTER_FIELDS = ['biography', 'height', 'mass', 'gender', 'homeworld', 'species', 'imageUrl'] as const satisfies readonly (keyof CharacterInput)[];

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function withoutUndefined(obj: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;
}

function characterFromDoc(doc: CharacterDoc): Character {
  return {
    id: String(doc._id),
    name: doc.name,
    affiliations: [...(doc.affiliations ?? [])],
    masters: [...(doc.masters ?? [])],
    biography: doc.biography ?? undefined,
    height: doc.height ?? undefined,
    mass: doc.mass ?? undefined,
    gender: doc.gender ?? undefined,
    homeworld: doc.homeworld ?? undefined,
    species: doc.species ?? undefined,
    imageUrl: doc.imageUrl ?? undefined,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function teamFromDoc(doc: TeamDoc): Team {
  return {
    id: String(doc._id),
    name: doc.name,
    ownerId: doc.ownerId ?? undefined,
    members: [...(doc.members ?? [])],
    version: doc.version ?? 0,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function entryFromDoc(doc: SearchIndexEntryDoc): SearchIndexEntry {
  return {
    characterId: String(doc._id),
    vector: [...doc.vector],
    textHash: doc.textHash,
    model: doc.model,
    updatedAt: doc.updatedAt,
  };
}

const copyCharacter = (c: Character): Character => ({ ...c, affiliations: [...c.affiliations], masters: [...c.masters] });
const copyTeam = (t: Team): Team => ({ ...t, members: [...t.members] });
const copyEntry = (e: SearchIndexEntry): SearchIndexEntry => ({ ...e, vector: [...e.vector] });

function matchesSearch(c: Character, search: string): boolean {
  const q = search.toLowerCase();
  return [c.name, c.species, c.homeworld].some((f) => typeof f === 'string' && f.toLowerCase().includes(q));
}

export function createRepo(opts: { provider: Provider }) {
  // In-memory storage for local mode
  const localStore = {
    characters: new Map<string, Character>(),
    teams: new Map<string, Team>(),
    index: new Map<string, SearchIndexEntry>(),
  };

  let idCounter = 0;
  const generateLocalId = (): string => `local_${Date.now()}_${++idCounter}`;

  const getProvider = (): Provider => opts.provider;
  const isLocal = () => getProvider() === 'local';

  return {
    getProvider,
    isLocal,

    // --- characters -------------------------------------------------------

    async getCharacter(id: string): Promise<Character | null> {
      if (isLocal()) {
        const c = localStore.characters.get(id);
        return c ? copyCharacter(c) : null;
      }
      const doc = await CharacterModel.findById(id).lean<CharacterDoc | null>();
      return doc ? characterFromDoc(doc) : null;
    },

    async getCharacters(ids: string[]): Promise<Character[]> {
      if (ids.length === 0) return [];
      if (isLocal()) {
        return ids.flatMap((id) => {
          const c = localStore.characters.get(id);
          return c ? [copyCharacter(c)] : [];
        });
      }
      const docs = await CharacterModel.find({ _id: { $in: ids } }).lean<CharacterDoc[]>();
      return docs.map(characterFromDoc);
    },

    async listCharacters(query: CharacterQuery = {}): Promise<Character[]> {
      const offset = query.offset ?? 0;
      const limit = query.limit ?? 100;
      const search = query.search?.trim();
      if (isLocal()) {
        return [...localStore.characters.values()]
          .filter((c) => !search || matchesSearch(c, search))
          .sort((a, b) => a.name.localeCompare(b.name))
          .slice(offset, offset + limit)
          .map(copyCharacter);
      }
      const filter = search
        ? { $or: ['name', 'species', 'homeworld'].map((f) => ({ [f]: { $regex: escapeRegex(search), $options: 'i' } })) }
        : {};
      const docs = await CharacterModel.find(filter).sort({ name: 1 }).skip(offset).limit(limit).lean<CharacterDoc[]>();
      return docs.map(characterFromDoc);
    },

    async upsertCharacter(input: CharacterInput): Promise<{ character: Character; created: boolean }> {
      const { id, ...fields } = input;
      if (isLocal()) {
        const existing = localStore.characters.get(id);
        const now = new Date();
        const character: Character = {
          ...input,
          affiliations: [...input.affiliations],
          masters: [...input.masters],
          createdAt: existing?.createdAt ?? now,
          updatedAt: now,
        };
        localStore.characters.set(id, character);
        return { character: copyCharacter(character), created: !existing };
      }
      const unset = Object.fromEntries(OPTIONAL_CHARACTER_FIELDS.filter((k) => fields[k] === undefined).map((k) => [k, '']));
      const update = Object.keys(unset).length > 0 ? { $set: withoutUndefined(fields), $unset: unset } : { $set: withoutUndefined(fields) };
      const res = await CharacterModel.updateOne({ _id: id }, update, { upsert: true });
      const doc = await CharacterModel.findById(id).lean<CharacterDoc | null>();
      if (!doc) throw new CoreError('character_not_found', `Character ${id} vanished after upsert`);
      return { character: characterFromDoc(doc), created: res.upsertedCount > 0 };
    },

    async deleteCharacter(id: string): Promise<boolean> {
      if (isLocal()) {
        return localStore.characters.delete(id);
      }
      const res = await CharacterModel.deleteOne({ _id: id });
      return res.deletedCount > 0;
    },

    // --- teams ------------------------------------------------------------

    async createTeam(input: { name: string; ownerId?: string }): Promise<Team> {
      if (isLocal()) {
        const taken = [...localStore.teams.values()].some((t) => t.name === input.name);
        if (taken) throw new CoreError('team_name_taken', `A team named "${input.name}" already exists`);
        const now = new Date();
        const team: Team = { id: generateLocalId(), name: input.name, ownerId: input.ownerId, members: [], version: 0, createdAt: now, updatedAt: now };
        localStore.teams.set(team.id, team);
        return copyTeam(team);
      }
      try {
        const created = await TeamModel.create({ name: input.name, ownerId: input.ownerId, members: [], version: 0 });
        return teamFromDoc({
          _id: created._id,
          name: created.name,
          ownerId: created.ownerId,
          members: created.members,
          version: created.version,
          createdAt: created.createdAt,
          updatedAt: created.updatedAt,
        });
      } catch (e) {
        if (isDuplicateKeyError(e)) throw new CoreError('team_name_taken', `A team named "${input.name}" already exists`);
        throw e;
      }
    },

    async getTeam(id: string): Promise<Team | null> {
      if (isLocal()) {
        const t = localStore.teams.get(id);
        return t ? copyTeam(t) : null;
      }
      if (!Types.ObjectId.isValid(id)) return null;
      const doc = await TeamModel.findById(id).lean<TeamDoc | null>();
      return doc ? teamFromDoc(doc) : null;
    },

    async listTeams(filter: TeamFilter = {}): Promise<Team[]> {
      if (isLocal()) {
        return [...localStore.teams.values()]
          .filter((t) => !filter.ownerId || t.ownerId === filter.ownerId)
          .filter((t) => !filter.memberId || t.members.includes(filter.memberId))
          .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
          .map(copyTeam);
      }
      const query: { ownerId?: string; members?: string } = {};
      if (filter.ownerId) query.ownerId = filter.ownerId;
      if (filter.memberId) query.members = filter.memberId;
      const docs = await TeamModel.find(query).sort({ createdAt: -1 }).lean<TeamDoc[]>();
      return docs.map(teamFromDoc);
    },

    /**
     * Writes `members` only if the stored version still equals
     * `expectedVersion`; returns null on a version mismatch or missing team.
     */
    async compareAndSetMembers(id: string, expectedVersion: number, members: string[]): Promise<Team | null> {
      if (isLocal()) {
        const current = localStore.teams.get(id);
        if (!current || current.version !== expectedVersion) return null;
        const updated: Team = { ...current, members: [...members], version: current.version + 1, updatedAt: new Date() };
        localStore.teams.set(id, updated);
        return copyTeam(updated);
      }
      if (!Types.ObjectId.isValid(id)) return null;
      const doc = await TeamModel.findOneAndUpdate(
        { _id: id, version: expectedVersion },
        { $set: { members }, $inc: { version: 1 } },
        { new: true },
      ).lean<TeamDoc | null>();
      return doc ? teamFromDoc(doc) : null;
    },

    async renameTeam(id: string, name: string): Promise<Team | null> {
      if (isLocal()) {
        const current = localStore.teams.get(id);
        if (!current) return null;
        const taken = [...localStore.teams.values()].some((t) => t.id !== id && t.name === name);
        if (taken) throw new CoreError('team_name_taken', `A team named "${name}" already exists`);
        const updated: Team = { ...current, name, updatedAt: new Date() };
        localStore.teams.set(id, updated);
        return copyTeam(updated);
      }
      if (!Types.ObjectId.isValid(id)) return null;
      try {
        const doc = await TeamModel.findByIdAndUpdate(id, { $set: { name } }, { new: true }).lean<TeamDoc | null>();
        return doc ? teamFromDoc(doc) : null;
      } catch (e) {
        if (isDuplicateKeyError(e)) throw new CoreError('team_name_taken', `A team named "${name}" already exists`);
        throw e;
      }
    },

    async deleteTeam(id: string): Promise<boolean> {
      if (isLocal()) {
        return localStore.teams.delete(id);
      }
      if (!Types.ObjectId.isValid(id)) return false;
      const res = await TeamModel.deleteOne({ _id: id });
      return res.deletedCount > 0;
    },

    // --- search index -----------------------------------------------------

    async getIndexEntry(characterId: string): Promise<SearchIndexEntry | null> {
      if (isLocal()) {
        const e = localStore.index.get(characterId);
        return e ? copyEntry(e) : null;
      }
      const doc = await SearchIndexEntryModel.findById(characterId).lean<SearchIndexEntryDoc | null>();
      return doc ? entryFromDoc(doc) : null;
    },

    /** Replaces the whole entry in one write. */
    async putIndexEntry(entry: SearchIndexEntry): Promise<void> {
      if (isLocal()) {
        localStore.index.set(entry.characterId, copyEntry(entry));
        return;
      }
      await SearchIndexEntryModel.replaceOne(
        { _id: entry.characterId },
        { _id: entry.characterId, vector: entry.vector, textHash: entry.textHash, model: entry.model, updatedAt: entry.updatedAt },
        { upsert: true },
      );
    },

    async listIndexEntries(): Promise<SearchIndexEntry[]> {
      if (isLocal()) {
        return [...localStore.index.values()].map(copyEntry);
      }
      const docs = await SearchIndexEntryModel.find({}).lean<SearchIndexEntryDoc[]>();
      return docs.map(entryFromDoc);
    },

    async deleteIndexEntry(characterId: string): Promise<boolean> {
      if (isLocal()) {
        return localStore.index.delete(characterId);
      }
      const res = await SearchIndexEntryModel.deleteOne({ _id: characterId });
      return res.deletedCount > 0;
    },
  };
}

export type Repo = ReturnType<typeof createRepo>;
