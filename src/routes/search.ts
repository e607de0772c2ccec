import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Repo } from '../db/repo.js';
import type { SemanticIndex } from '../services/semanticIndex.js';

export interface SearchRoutesOptions {
  repo: Repo;
  index: SemanticIndex;
}

const searchQuery = z.object({
  q: z.string().default(''),
  // Range is enforced by SemanticIndex.search (invalid_query).
  limit: z.coerce.number().default(10),
});

export default async function searchRoutes(app: FastifyInstance, opts: SearchRoutesOptions) {
  const { repo, index } = opts;

  app.get('/search', async (req) => {
    const { q, limit } = searchQuery.parse(req.query);
    const hits = await index.search(q, limit);
    const characters = await repo.getCharacters(hits.map((h) => h.characterId));
    const names = new Map(characters.map((c) => [c.id, c.name]));
    return {
      query: q,
      results: hits.map((h) => ({ ...h, name: names.get(h.characterId) })),
    };
  });
}
