import type { EmbeddingVector } from './embedding.types.js';

/**
 * Cosine similarity of two vectors, in [-1, 1].
 *
 * Returns 0 when either vector has zero magnitude. Throws a RangeError when
 * the lengths differ or a component is not a finite number, so callers can
 * decide whether to drop the pair.
 */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[],
): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  if (!Number.isFinite(dot) || !Number.isFinite(magA) || !Number.isFinite(magB)) {
    throw new RangeError('Cannot compute similarity of non-finite vectors');
  }

  if (magA === 0 || magB === 0) {
    return 0;
  }

  const similarity = dot / (Math.sqrt(magA) * Math.sqrt(magB));
  // rounding can push identical directions a hair past 1
  return Math.max(-1, Math.min(1, similarity));
}

export function l2Norm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Scale a vector to unit length. Returns null for zero-length, zero-norm or
 * non-finite input, which cannot be normalised.
 */
export function normalize(vector: readonly number[]): EmbeddingVector | null {
  if (vector.length === 0) {
    return null;
  }
  const norm = l2Norm(vector);
  if (norm === 0 || !Number.isFinite(norm)) {
    return null;
  }
  return vector.map((value) => value / norm);
}
