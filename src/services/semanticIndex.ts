import type { Repo } from '../db/repo.js';
import { textHash } from '../lib/crypto.js';
import { embedWithTimeout, type EmbeddingProvider } from '../lib/embeddings.js';
import { CoreError } from '../lib/errors.js';
import { KeyedMutex } from '../lib/keyedMutex.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import { cosineSimilarity } from '../lib/vector.js';
import type { Character, SearchHit, SearchIndexEntry } from '../types.js';

/** Where entries live. `put` must replace the whole entry in one write. */
export interface IndexStore {
  get(characterId: string): Promise<SearchIndexEntry | null>;
  put(entry: SearchIndexEntry): Promise<void>;
  list(): Promise<SearchIndexEntry[]>;
  delete(characterId: string): Promise<boolean>;
}

export function repoIndexStore(repo: Repo): IndexStore {
  return {
    get: (id) => repo.getIndexEntry(id),
    put: (entry) => repo.putIndexEntry(entry),
    list: () => repo.listIndexEntries(),
    delete: (id) => repo.deleteIndexEntry(id),
  };
}

export type IndexableCharacter = Pick<Character, 'id' | 'name' | 'affiliations' | 'biography'>;

export interface UpsertResult {
  status: 'unchanged' | 'indexed';
  entry: SearchIndexEntry;
}

export interface SemanticIndexOptions {
  store: IndexStore;
  provider: EmbeddingProvider;
  timeoutMs: number;
  logger?: Logger;
}

// Biography when there is one, otherwise name and affiliations.
export function embeddingText(character: IndexableCharacter): string {
  const bio = character.biography?.trim();
  if (bio) return bio;
  const affiliations = character.affiliations.map((a) => a.trim()).filter(Boolean);
  return affiliations.length ? `${character.name}. ${affiliations.join(', ')}` : character.name;
}

export class SemanticIndex {
  private readonly store: IndexStore;
  private readonly provider: EmbeddingProvider;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly locks = new KeyedMutex();
  private closed = false;

  constructor(opts: SemanticIndexOptions) {
    this.store = opts.store;
    this.provider = opts.provider;
    this.timeoutMs = opts.timeoutMs;
    this.log = (opts.logger ?? rootLogger).child({ component: 'semantic-index', provider: opts.provider.name });
  }

  private assertOpen(): void {
    if (this.closed) throw new CoreError('index_closed', 'Semantic index has been shut down');
  }

  /**
   * Re-embeds a character when its text or the embedding provider changed.
   * The new entry is computed
   * in full before it replaces the old one; if the provider fails the old
   * entry stays as it was. Upserts of one character are serialized.
   */
  async upsert(character: IndexableCharacter): Promise<UpsertResult> {
    this.assertOpen();
    return this.locks.run(character.id, async () => {
      const text = embeddingText(character);
      const hash = textHash(text);

      const existing = await this.store.get(character.id);
      // An entry from another provider lives in another vector space.
      if (existing && existing.textHash === hash && existing.model === this.provider.name) {
        return { status: 'unchanged', entry: existing };
      }

      const vector = await embedWithTimeout(this.provider, text, this.timeoutMs);
      const entry: SearchIndexEntry = {
        characterId: character.id,
        vector,
        textHash: hash,
        model: this.provider.name,
        updatedAt: new Date(),
      };
      await this.store.put(entry);
      this.log.debug({ characterId: character.id, dims: vector.length }, 'character indexed');
      return { status: 'indexed', entry };
    });
  }

  /**
   * Ranks every entry by cosine similarity to the query, highest first;
   * equal scores are ordered by character id so repeated searches agree.
   */
  async search(query: string, limit: number | undefined): Promise<SearchHit[]> {
    this.assertOpen();
    if (typeof limit !== 'number' || !Number.isInteger(limit) || limit <= 0) {
      throw new CoreError('invalid_query', 'limit must be a positive integer', { details: { limit } });
    }
    const text = query.trim();
    if (!text) {
      throw new CoreError('invalid_query', 'query must not be empty');
    }

    const queryVector = await embedWithTimeout(this.provider, text, this.timeoutMs);
    const entries = await this.store.list();

    const hits: SearchHit[] = [];
    let skipped = 0;
    for (const entry of entries) {
      if (entry.vector.length !== queryVector.length) {
        skipped++;
        continue;
      }
      hits.push({ characterId: entry.characterId, score: cosineSimilarity(queryVector, entry.vector) });
    }
    if (skipped > 0) {
      this.log.warn({ skipped, dims: queryVector.length }, 'skipped index entries with a different dimensionality; reindex them');
    }

    hits.sort((a, b) => b.score - a.score || (a.characterId < b.characterId ? -1 : a.characterId > b.characterId ? 1 : 0));
    return hits.slice(0, limit);
  }

  async remove(characterId: string): Promise<boolean> {
    this.assertOpen();
    return this.locks.run(characterId, () => this.store.delete(characterId));
  }

  /** Stops accepting work and waits for in-flight upserts to settle. */
  async close(): Promise<void> {
    this.closed = true;
    await this.locks.drain();
    this.log.info('semantic index closed');
  }
}
