#!/usr/bin/env node
import 'dotenv/config';
import fetch from 'cross-fetch';
import { connectDatabase, disconnectDatabase } from './db/connection.js';
import { createRepo } from './db/repo.js';
import { loadConfig } from './lib/config.js';
import { createEmbeddingProvider } from './lib/embeddings.js';
import { errorMessage } from './lib/errors.js';
import { createLogger } from './lib/logger.js';
import { appendQuery } from './lib/url.js';
import { createBiographyGenerator } from './services/biographyService.js';
import { ensurePersistentTarget, fetchCatalog, populateCharacters } from './services/catalogImport.js';
import { repoIndexStore, SemanticIndex } from './services/semanticIndex.js';

function printUsage() {
  console.log([
    'Usage:',
    '  holocron populate [--limit N] [--max-workers N] [--skip-ai] [--dry-run]',
    '  holocron search <query> [--limit N] [--server URL]',
  ].join('\n'));
}

interface ParsedArgs {
  cmd?: string;
  positional: string[];
  flags: Record<string, string | true>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const [cmd, ...rest] = argv;
  const positional: string[] = [];
  const flags: Record<string, string | true> = {};
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const key = arg.slice(2);
    const next = rest[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = true;
    }
  }
  return { cmd, positional, flags };
}

function intFlag(flags: ParsedArgs['flags'], name: string): number | undefined {
  const v = flags[name];
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`--${name} expects a positive integer`);
  }
  return n;
}

async function populate(args: ParsedArgs): Promise<number> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const repo = createRepo({ provider: config.dbProvider });
  ensurePersistentTarget(repo, { dryRun: args.flags['dry-run'] === true }, logger);
  await connectDatabase(config, logger);

  const index = new SemanticIndex({
    store: repoIndexStore(repo),
    provider: createEmbeddingProvider(config),
    timeoutMs: config.embedding.timeoutMs,
    logger,
  });
  const biography = createBiographyGenerator({
    conn: { apiKey: config.openai.apiKey, baseUrl: config.openai.baseUrl },
    model: config.openai.chatModel,
    logger,
  });

  try {
    const records = await fetchCatalog(config.populate.catalogUrl, logger);
    logger.info(`Fetched ${records.length} characters from the catalog.`);
    const summary = await populateCharacters(records, {
      limit: intFlag(args.flags, 'limit'),
      maxWorkers: intFlag(args.flags, 'max-workers') ?? config.populate.maxWorkers,
      skipAi: args.flags['skip-ai'] === true,
    }, { repo, index, biography, logger });
    console.log(JSON.stringify(summary, null, 2));
    return summary.failed > 0 ? 1 : 0;
  } finally {
    await index.close();
    await disconnectDatabase(config);
  }
}

async function search(args: ParsedArgs): Promise<number> {
  const query = args.positional.join(' ').trim();
  if (!query) {
    printUsage();
    return 1;
  }
  const serverFlag = args.flags.server;
  const server = typeof serverFlag === 'string' ? serverFlag : (process.env.HOLOCRON_URL || 'http://127.0.0.1:3101');
  const url = appendQuery(`${server.replace(/\/$/, '')}/search`, { q: query, limit: intFlag(args.flags, 'limit') });

  const resp = await fetch(url);
  const txt = await resp.text();
  if (!resp.ok) {
    console.error('Search failed:', resp.status, txt);
    return 1;
  }
  console.log(txt);
  return 0;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.cmd || args.cmd === '--help' || args.cmd === '-h') {
    printUsage();
    return 0;
  }
  if (args.cmd === 'populate') return populate(args);
  if (args.cmd === 'search') return search(args);
  printUsage();
  return 1;
}

main().then((code) => process.exit(code)).catch((err) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
