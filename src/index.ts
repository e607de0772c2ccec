import 'dotenv/config';
import { buildApp } from './app.js';
import { connectDatabase, disconnectDatabase } from './db/connection.js';
import { createRepo } from './db/repo.js';
import { loadConfig } from './lib/config.js';
import { createEmbeddingProvider } from './lib/embeddings.js';
import { createLogger } from './lib/logger.js';
import { repoIndexStore, SemanticIndex } from './services/semanticIndex.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);

await connectDatabase(config, logger);

const repo = createRepo({ provider: config.dbProvider });
const index = new SemanticIndex({
  store: repoIndexStore(repo),
  provider: createEmbeddingProvider(config),
  timeoutMs: config.embedding.timeoutMs,
  logger,
});
const app = await buildApp({ config, repo, index, logger });

app.addHook('onClose', async () => {
  await disconnectDatabase(config);
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info(`${signal} received, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err) => {
        app.log.error(err);
        process.exit(1);
      },
    );
  });
}

app.listen({ port: config.port, host: '0.0.0.0' }).then(() => {
  app.log.info(`holocron listening on :${config.port} [db=${config.dbProvider}, embeddings=${config.embedding.provider}]`);
}).catch((err) => {
  app.log.error(err);
  process.exit(1);
});
