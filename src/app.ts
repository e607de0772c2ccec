import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import type { Repo } from './db/repo.js';
import type { AppConfig } from './lib/config.js';
import { registerErrorHandler } from './lib/errorHandler.js';
import type { Logger } from './lib/logger.js';
import charactersRoutes from './routes/characters.js';
import searchRoutes from './routes/search.js';
import teamsRoutes from './routes/teams.js';
import { createAlignmentService } from './services/alignmentService.js';
import type { SemanticIndex } from './services/semanticIndex.js';
import { createTeamService } from './services/teamService.js';

export interface AppDeps {
  config: Pick<AppConfig, 'evilAffiliations'>;
  repo: Repo;
  index: SemanticIndex;
  logger: Logger;
}

/**
 * Wires services and routes. The semantic index is owned by the caller but
 * closed together with the app.
 */
export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify<Server, IncomingMessage, ServerResponse, FastifyBaseLogger>({ loggerInstance: deps.logger });

  const alignment = createAlignmentService({ repo: deps.repo, evilAffiliations: deps.config.evilAffiliations });
  const teams = createTeamService({ repo: deps.repo, alignment, logger: deps.logger });

  registerErrorHandler(app);

  // Simple health
  app.get('/health', async () => ({ ok: true, db: deps.repo.getProvider() }));

  await app.register(charactersRoutes, { repo: deps.repo, alignment, index: deps.index, teams });
  await app.register(teamsRoutes, { teams });
  await app.register(searchRoutes, { repo: deps.repo, index: deps.index });

  app.addHook('onClose', async () => {
    await deps.index.close();
  });

  return app;
}
