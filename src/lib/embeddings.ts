import type { AppConfig } from './config.js';
import { CoreError, errorMessage } from './errors.js';
import { openaiEmbed, type OpenAIConnection } from './openaiClient.js';
import { isVector, normalize, type EmbeddingVector } from './vector.js';
import crypto from 'crypto';

/**
 * Text to fixed-length vector. Implementations must return the same
 * dimensionality on every call and should honour `signal`.
 */
export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector>;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;

  constructor(private readonly conn: OpenAIConnection, private readonly model: string) {
    this.name = `openai:${model}`;
  }

  embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
    return openaiEmbed(this.conn, text, { model: this.model, signal });
  }
}

/**
 * Hashed bag-of-words embedder. Needs no network, so the service stays
 * usable without an API key; similarity then reflects shared vocabulary.
 */
export class LocalHashEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;

  constructor(private readonly dimensions = 256) {
    this.name = `local:hash-${dimensions}`;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const v = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const digest = crypto.createHash('sha1').update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      v[bucket] += (digest[4] & 1) === 0 ? 1 : -1;
    }
    return normalize(v);
  }
}

const STOPWORDS = new Set(['a', 'an', 'the', 'of', 'and', 'or', 'to', 'in', 'on', 'is', 'who', 'with', 'for', 'from', 'his', 'her', 'their']);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter((t) => t.length > 1 && !STOPWORDS.has(t));
}

export function createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
  if (config.embedding.provider === 'openai') {
    return new OpenAIEmbeddingProvider(
      { apiKey: config.openai.apiKey, baseUrl: config.openai.baseUrl },
      config.openai.embeddingModel,
    );
  }
  return new LocalHashEmbeddingProvider(config.embedding.dimensions);
}

/**
 * Calls the provider under a deadline. Timeouts, provider errors and
 * malformed vectors all become `embedding_unavailable`.
 */
export async function embedWithTimeout(provider: EmbeddingProvider, text: string, timeoutMs: number): Promise<EmbeddingVector> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the race settles with the timeout, not the abort error.
      reject(new CoreError('embedding_unavailable', `Embedding provider ${provider.name} timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    const vector = await Promise.race([provider.embed(text, controller.signal), deadline]);
    if (!isVector(vector)) {
      throw new CoreError('embedding_unavailable', `Embedding provider ${provider.name} returned a malformed vector`);
    }
    return vector;
  } catch (err) {
    if (err instanceof CoreError) throw err;
    throw new CoreError('embedding_unavailable', `Embedding provider ${provider.name} failed: ${errorMessage(err)}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}
