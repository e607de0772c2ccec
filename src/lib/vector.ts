export type EmbeddingVector = number[];

export function l2norm(v: readonly number[]): number {
  let s = 0;
  for (const x of v) s += x * x;
  return Math.sqrt(s);
}

export function normalize(v: readonly number[]): EmbeddingVector {
  const n = l2norm(v);
  if (n <= 1e-12) return v.map(() => 0);
  return v.map((x) => x / n);
}

/**
 * Cosine similarity in [-1, 1]. A zero-length or zero-magnitude vector has
 * no direction, so it scores 0 against everything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`vector_dimension_mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na <= 1e-12 || nb <= 1e-12) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function isVector(value: unknown): value is EmbeddingVector {
  return Array.isArray(value) && value.length > 0 && value.every((x) => typeof x === 'number' && Number.isFinite(x));
}
