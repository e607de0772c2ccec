import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3101),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DB_PROVIDER: z
    .string()
    .optional()
    .transform((v) => (v ? v.toLowerCase() : undefined))
    .pipe(z.enum(['local', 'mongo']).optional()),
  MONGO_URL: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_PROVIDER: z
    .string()
    .optional()
    .transform((v) => (v ? v.toLowerCase() : undefined))
    .pipe(z.enum(['openai', 'local']).optional()),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(256),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  POPULATE_MAX_WORKERS: z.coerce.number().int().positive().default(8),
  STARWARS_API_URL: z.string().url().default('https://akabab.github.io/starwars-api/api/all.json'),
  EVIL_AFFILIATIONS: optionalString,
});

export type DbProvider = 'local' | 'mongo';

export interface AppConfig {
  port: number;
  logLevel: z.infer<typeof configSchema>['LOG_LEVEL'];
  dbProvider: DbProvider;
  mongoUrl?: string;
  openai: {
    apiKey?: string;
    baseUrl: string;
    chatModel: string;
    embeddingModel: string;
  };
  embedding: {
    provider: 'openai' | 'local';
    dimensions: number;
    timeoutMs: number;
  };
  populate: {
    maxWorkers: number;
    catalogUrl: string;
  };
  /** Overrides the built-in known-evil affiliation list when set. */
  evilAffiliations?: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = configSchema.parse(env);
  const dbProvider: DbProvider = raw.DB_PROVIDER ?? (raw.MONGO_URL ? 'mongo' : 'local');
  // Without a key the OpenAI embedder cannot work; fall back to the local one.
  const embeddingProvider = raw.EMBEDDING_PROVIDER ?? (raw.OPENAI_API_KEY ? 'openai' : 'local');
  const evilAffiliations = raw.EVIL_AFFILIATIONS
    ?.split(',')
    .map((s) => s.trim())
    .filter(Boolean);

  return {
    port: raw.PORT,
    logLevel: raw.LOG_LEVEL,
    dbProvider,
    mongoUrl: raw.MONGO_URL,
    openai: {
      apiKey: raw.OPENAI_API_KEY,
      baseUrl: raw.OPENAI_BASE.replace(/\/$/, ''),
      chatModel: raw.OPENAI_MODEL,
      embeddingModel: raw.OPENAI_EMBEDDING_MODEL,
    },
    embedding: {
      provider: embeddingProvider,
      dimensions: raw.EMBEDDING_DIMENSIONS,
      timeoutMs: raw.EMBEDDING_TIMEOUT_MS,
    },
    populate: {
      maxWorkers: raw.POPULATE_MAX_WORKERS,
      catalogUrl: raw.STARWARS_API_URL,
    },
    evilAffiliations: evilAffiliations && evilAffiliations.length ? evilAffiliations : undefined,
  };
}
