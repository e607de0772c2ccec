import fetch from 'cross-fetch';
import { z } from 'zod';
import type { Repo } from '../db/repo.js';
import { errorMessage, isCoreError } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import { runWithConcurrency } from '../lib/workerPool.js';
import type { CharacterInput } from '../types.js';
import type { BiographyGenerator } from './biographyService.js';
import type { SemanticIndex } from './semanticIndex.js';

const textOrList = z
  .union([z.string(), z.array(z.string())])
  .nullish()
  .transform((v) => (Array.isArray(v) ? v.join(', ') : v ?? undefined))
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const numberish = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => safeFloat(v));

export const catalogCharacterSchema = z.object({
  id: z.union([z.number(), z.string().min(1)]).transform(String),
  name: z.string().trim().min(1),
  height: numberish,
  mass: numberish,
  gender: textOrList,
  homeworld: textOrList,
  species: textOrList,
  image: z.string().nullish(),
  affiliations: z.array(z.string()).nullish().transform((v) => v ?? []),
  masters: z
    .union([z.string(), z.array(z.string())])
    .nullish()
    .transform((v) => (v == null ? [] : Array.isArray(v) ? v : [v])),
});

export type CatalogCharacter = z.output<typeof catalogCharacterSchema>;

export function safeFloat(value: number | string | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  const s = value.trim();
  if (!s || s.toLowerCase() === 'unknown') return undefined;
  const n = Number(s.replace(',', '.'));
  return Number.isFinite(n) ? n : undefined;
}

export async function fetchCatalog(url: string, log: Logger = rootLogger): Promise<CatalogCharacter[]> {
  const res = await fetch(url);
  if (!res.ok) {
    throw new Error(`catalog_fetch_failed: ${res.status} ${res.statusText}`);
  }
  const body = z.array(z.unknown()).parse(await res.json());
  const records: CatalogCharacter[] = [];
  body.forEach((raw, i) => {
    const parsed = catalogCharacterSchema.safeParse(raw);
    if (parsed.success) records.push(parsed.data);
    else log.warn({ index: i, issues: parsed.error.issues.length }, 'skipping malformed catalog record');
  });
  return records;
}

/**
 * Masters arrive as names; they are stored as ids. Names that match no
 * catalog character are dropped.
 */
export function toCharacterInput(record: CatalogCharacter, idsByName: ReadonlyMap<string, string>): CharacterInput {
  const masters: string[] = [];
  for (const name of record.masters) {
    const id = idsByName.get(name.trim().toLowerCase());
    if (id && id !== record.id && !masters.includes(id)) masters.push(id);
  }
  return {
    id: record.id,
    name: record.name,
    affiliations: record.affiliations.map((a) => a.trim()).filter(Boolean),
    masters,
    height: record.height,
    mass: record.mass,
    gender: record.gender,
    homeworld: record.homeworld,
    species: record.species,
    imageUrl: record.image ?? undefined,
  };
}

/**
 * The local provider keeps nothing once the process exits; populating it is
 * only allowed as an explicit dry run.
 */
export function ensurePersistentTarget(repo: Pick<Repo, 'isLocal'>, opts: { dryRun?: boolean }, log: Logger = rootLogger): void {
  if (!repo.isLocal()) return;
  if (!opts.dryRun) {
    throw new Error('populate needs a persistent database: set MONGO_URL or DB_PROVIDER=mongo, or pass --dry-run');
  }
  log.warn('dry run against the in-memory store; nothing will be kept');
}

export interface PopulateOptions {
  limit?: number;
  maxWorkers: number;
  skipAi?: boolean;
}

export interface PopulateDeps {
  repo: Repo;
  index?: SemanticIndex;
  biography?: BiographyGenerator;
  logger?: Logger;
}

export interface PopulateSummary {
  fetched: number;
  processed: number;
  created: number;
  updated: number;
  failed: number;
  indexed: number;
  indexFailed: number;
}

export async function populateCharacters(records: CatalogCharacter[], opts: PopulateOptions, deps: PopulateDeps): Promise<PopulateSummary> {
  const log = (deps.logger ?? rootLogger).child({ component: 'populate' });
  const selected = opts.limit && opts.limit > 0 ? records.slice(0, opts.limit) : records;
  // Resolve masters against the whole catalog, not just the selected slice.
  const idsByName = new Map(records.map((r) => [r.name.toLowerCase(), r.id]));
  const biography = opts.skipAi ? undefined : deps.biography;
  const index = opts.skipAi ? undefined : deps.index;

  const summary: PopulateSummary = { fetched: records.length, processed: 0, created: 0, updated: 0, failed: 0, indexed: 0, indexFailed: 0 };
  log.info({ count: selected.length, maxWorkers: opts.maxWorkers }, 'processing characters');

  const results = await runWithConcurrency(selected, opts.maxWorkers, async (record) => {
    const input = toCharacterInput(record, idsByName);
    const existing = await deps.repo.getCharacter(input.id);
    input.biography = existing?.biography ?? (biography ? await biography.generate(input) : undefined);

    const { character, created } = await deps.repo.upsertCharacter(input);

    let indexed: boolean | undefined;
    if (index) {
      try {
        await index.upsert(character);
        indexed = true;
      } catch (e) {
        if (!isCoreError(e, 'embedding_unavailable')) throw e;
        log.warn({ characterId: character.id, err: e.message }, 'embedding failed; character saved without index entry');
        indexed = false;
      }
    }

    summary.processed++;
    if (summary.processed % 10 === 0 || summary.processed === selected.length) {
      log.info({ processed: summary.processed, total: selected.length }, 'progress');
    }
    return { created, indexed };
  });

  results.forEach((r, i) => {
    if (r.status === 'rejected') {
      summary.failed++;
      log.error({ name: selected[i].name, err: errorMessage(r.reason) }, 'failed to process character');
      return;
    }
    if (r.value.created) summary.created++;
    else summary.updated++;
    if (r.value.indexed === true) summary.indexed++;
    if (r.value.indexed === false) summary.indexFailed++;
  });

  log.info(summary, 'populate finished');
  return summary;
}
