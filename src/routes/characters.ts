import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Repo } from '../db/repo.js';
import { CoreError } from '../lib/errors.js';
import type { AlignmentService } from '../services/alignmentService.js';
import type { SemanticIndex } from '../services/semanticIndex.js';
import type { TeamService } from '../services/teamService.js';

export interface CharactersRoutesOptions {
  repo: Repo;
  alignment: AlignmentService;
  index: SemanticIndex;
  teams: TeamService;
}

const idParams = z.object({ id: z.string().min(1) });

const listQuery = z.object({
  search: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export default async function charactersRoutes(app: FastifyInstance, opts: CharactersRoutesOptions) {
  const { repo, alignment, index, teams } = opts;

  async function loadCharacter(id: string) {
    const character = await repo.getCharacter(id);
    if (!character) throw new CoreError('character_not_found', `Character ${id} not found`);
    return character;
  }

  app.get('/characters', async (req) => {
    const query = listQuery.parse(req.query);
    const characters = await repo.listCharacters(query);
    return Promise.all(characters.map(async (c) => ({ ...c, verdict: (await alignment.verdictFor(c)).verdict })));
  });

  // The verdict is derived here on every read, never stored.
  app.get('/characters/:id', async (req) => {
    const { id } = idParams.parse(req.params);
    const character = await loadCharacter(id);
    const { verdict, rule, detail } = await alignment.verdictFor(character);
    return { ...character, alignment: { verdict, rule, detail } };
  });

  app.get('/characters/:id/alignment', async (req) => {
    const { id } = idParams.parse(req.params);
    return alignment.classifyCharacter(id);
  });

  // Leaves no team member or index entry pointing at the removed character.
  app.delete('/characters/:id', async (req, reply) => {
    const { id } = idParams.parse(req.params);
    await loadCharacter(id);
    const teamsChanged = await teams.removeCharacterFromTeams(id);
    await index.remove(id);
    await repo.deleteCharacter(id);
    req.log.info({ characterId: id, teamsChanged }, 'character deleted');
    return reply.code(204).send();
  });

  app.post('/characters/:id/index', async (req) => {
    const { id } = idParams.parse(req.params);
    const character = await loadCharacter(id);
    const { status, entry } = await index.upsert(character);
    return { characterId: id, status, textHash: entry.textHash, model: entry.model };
  });
}
