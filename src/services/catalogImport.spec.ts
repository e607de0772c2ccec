import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import crossFetch from 'cross-fetch';
import { createRepo, type Repo } from '../db/repo.js';
import type { EmbeddingProvider } from '../lib/embeddings.js';
import { createLogger } from '../lib/logger.js';
import type { BiographyGenerator, BiographySubject } from './biographyService.js';
import {
  catalogCharacterSchema,
  ensurePersistentTarget,
  fetchCatalog,
  populateCharacters,
  safeFloat,
  toCharacterInput,
  type CatalogCharacter,
} from './catalogImport.js';
import { repoIndexStore, SemanticIndex } from './semanticIndex.js';

vi.mock('cross-fetch', () => ({
  default: vi.fn(),
}));

const fetchMock = vi.mocked(crossFetch);
const logger = createLogger('silent');

const RAW = [
  {
    id: 1,
    name: 'Luke Skywalker',
    height: 1.72,
    mass: 73,
    gender: 'male',
    homeworld: 'tatooine',
    species: 'human',
    image: 'https://img.test/1.jpg',
    affiliations: ['Jedi Order', ' Rebel Alliance '],
    masters: ['Obi-Wan Kenobi', 'yoda'],
  },
  { id: 10, name: 'Obi-Wan Kenobi', homeworld: 'stewjon', masters: 'Qui-Gon Jinn' },
  { id: 20, name: 'Yoda', homeworld: null, mass: 'unknown', species: ['yoda\'s species'] },
];

const catalog = (): CatalogCharacter[] => RAW.map((r) => catalogCharacterSchema.parse(r));

describe('catalogImport', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('safeFloat', () => {
    it.each([
      [72, 72],
      [' 80 ', 80],
      ['1,5', 1.5],
      ['unknown', undefined],
      ['', undefined],
      ['tall', undefined],
      [Number.NaN, undefined],
      [null, undefined],
    ])('parses %s', (input, expected) => {
      expect(safeFloat(input)).toBe(expected);
    });
  });

  describe('catalogCharacterSchema', () => {
    it('normalizes ids, lists and blanks', () => {
      const [, obiWan, yoda] = catalog();
      expect(obiWan).toMatchObject({ id: '10', masters: ['Qui-Gon Jinn'], affiliations: [], species: undefined });
      expect(yoda).toMatchObject({ id: '20', homeworld: undefined, mass: undefined, species: 'yoda\'s species', masters: [] });
    });

    it('rejects a record without a name', () => {
      expect(catalogCharacterSchema.safeParse({ id: 5, name: '  ' }).success).toBe(false);
    });
  });

  describe('toCharacterInput', () => {
    it('resolves master names to ids and drops unknown ones', () => {
      const records = catalog();
      const idsByName = new Map(records.map((r) => [r.name.toLowerCase(), r.id]));

      expect(toCharacterInput(records[0], idsByName)).toEqual({
        id: '1',
        name: 'Luke Skywalker',
        affiliations: ['Jedi Order', 'Rebel Alliance'],
        masters: ['10', '20'],
        height: 1.72,
        mass: 73,
        gender: 'male',
        homeworld: 'tatooine',
        species: 'human',
        imageUrl: 'https://img.test/1.jpg',
      });
      expect(toCharacterInput(records[1], idsByName).masters).toEqual([]);
    });

    it('drops self references', () => {
      const record = catalogCharacterSchema.parse({ id: 7, name: 'Loop', masters: ['Loop'] });
      expect(toCharacterInput(record, new Map([['loop', '7']])).masters).toEqual([]);
    });
  });

  describe('fetchCatalog', () => {
    it('keeps well-formed records and skips the rest', async () => {
      fetchMock.mockResolvedValueOnce(new Response(JSON.stringify([RAW[1], { name: 'No Id' }]), { status: 200 }));
      const records = await fetchCatalog('https://catalog.test/all.json', logger);
      expect(fetchMock).toHaveBeenCalledWith('https://catalog.test/all.json');
      expect(records.map((r) => r.id)).toEqual(['10']);
    });

    it('throws on a failed response', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 500, statusText: 'Internal Server Error' }));
      await expect(fetchCatalog('https://catalog.test/all.json', logger)).rejects.toThrow('catalog_fetch_failed: 500 Internal Server Error');
    });
  });

  describe('ensurePersistentTarget', () => {
    it('refuses the in-memory store', () => {
      expect(() => ensurePersistentTarget(createRepo({ provider: 'local' }), {}, logger))
        .toThrow('populate needs a persistent database: set MONGO_URL or DB_PROVIDER=mongo, or pass --dry-run');
    });

    it('only warns on an explicit dry run', () => {
      const log = createLogger('silent');
      const warn = vi.spyOn(log, 'warn');
      expect(() => ensurePersistentTarget(createRepo({ provider: 'local' }), { dryRun: true }, log)).not.toThrow();
      expect(warn).toHaveBeenCalledWith('dry run against the in-memory store; nothing will be kept');
    });

    it('accepts mongo', () => {
      expect(() => ensurePersistentTarget(createRepo({ provider: 'mongo' }), {}, logger)).not.toThrow();
    });
  });

  describe('populateCharacters', () => {
    let repo: Repo;
    let generated: string[];
    let inFlight: number;
    let peak: number;
    let biography: BiographyGenerator;

    beforeEach(() => {
      repo = createRepo({ provider: 'local' });
      generated = [];
      inFlight = 0;
      peak = 0;
      biography = {
        async generate(subject: BiographySubject) {
          generated.push(subject.name);
          inFlight++;
          peak = Math.max(peak, inFlight);
          await new Promise((r) => setTimeout(r, 5));
          inFlight--;
          return `${subject.name} bio`;
        },
      };
    });

    const indexWith = (provider: EmbeddingProvider) =>
      new SemanticIndex({ store: repoIndexStore(repo), provider, timeoutMs: 1000, logger });

    it('creates, updates and indexes characters', async () => {
      await repo.upsertCharacter({ id: '1', name: 'Luke Skywalker', affiliations: [], masters: [], biography: 'Existing.' });
      const provider: EmbeddingProvider = {
        name: 'fake',
        embed: async (text) => {
          if (text === 'Yoda bio') throw new Error('quota exceeded');
          return [1, 0];
        },
      };

      const summary = await populateCharacters(catalog(), { maxWorkers: 2 }, { repo, index: indexWith(provider), biography, logger });

      expect(summary).toEqual({ fetched: 3, processed: 3, created: 2, updated: 1, failed: 0, indexed: 2, indexFailed: 1 });
      expect(generated.sort()).toEqual(['Obi-Wan Kenobi', 'Yoda']);
      expect(await repo.getCharacter('1')).toMatchObject({ biography: 'Existing.', masters: ['10', '20'] });
      expect((await repo.getCharacter('20'))?.biography).toBe('Yoda bio');
      expect(await repo.getIndexEntry('20')).toBeNull();
    });

    it('never runs more than maxWorkers at once', async () => {
      const records = [1, 2, 3, 4, 5].map((n) => catalogCharacterSchema.parse({ id: n, name: `Trooper ${n}` }));
      await populateCharacters(records, { maxWorkers: 2 }, { repo, biography, logger });
      expect(peak).toBe(2);
      expect(await repo.listCharacters()).toHaveLength(5);
    });

    it('honours limit but resolves masters against the whole catalog', async () => {
      const summary = await populateCharacters(catalog(), { limit: 1, maxWorkers: 4, skipAi: true }, { repo, biography, logger });

      expect(summary).toMatchObject({ fetched: 3, processed: 1, created: 1 });
      expect(generated).toEqual([]);
      expect(await repo.getCharacter('1')).toMatchObject({ masters: ['10', '20'], biography: undefined });
      expect(await repo.getCharacter('10')).toBeNull();
    });

    it('counts a failing record without stopping the run', async () => {
      const upsert = repo.upsertCharacter;
      vi.spyOn(repo, 'upsertCharacter').mockImplementation(async (input) => {
        if (input.id === '10') throw new Error('write conflict');
        return upsert(input);
      });

      const summary = await populateCharacters(catalog(), { maxWorkers: 3, skipAi: true }, { repo, logger });

      expect(summary).toMatchObject({ processed: 2, created: 2, failed: 1 });
    });
  });
});
