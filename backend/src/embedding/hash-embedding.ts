import { createHash } from 'node:crypto';
import type { EmbeddingVector } from './embedding.types.js';
import { normalize } from './vector-math.js';

export const HASH_EMBEDDING_MODEL = 'hash-sha256-gaussian';

/**
 * sfc32 generator seeded from four 32-bit words. Small, fast and identical
 * on every platform, which is all the fallback embedding needs.
 */
function sfc32(a: number, b: number, c: number, d: number): () => number {
  return () => {
    a >>>= 0;
    b >>>= 0;
    c >>>= 0;
    d >>>= 0;
    let t = (a + b) | 0;
    a = b ^ (b >>> 9);
    b = (c + (c << 3)) | 0;
    c = (c << 21) | (c >>> 11);
    d = (d + 1) | 0;
    t = (t + d) | 0;
    c = (c + t) | 0;
    return (t >>> 0) / 4294967296;
  };
}

/**
 * Deterministic, non-semantic embedding derived from the UTF-8 bytes of the
 * text: SHA-256 seeds a PRNG, components are standard normal samples
 * (Box-Muller), and the result is scaled to unit length.
 *
 * Equal texts always map to the same vector; scores between different texts
 * carry no meaning beyond "not the same text".
 */
export function hashEmbedding(text: string, dimension: number): EmbeddingVector {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new RangeError(`Embedding dimension must be a positive integer, got ${dimension}`);
  }

  const digest = createHash('sha256').update(text, 'utf8').digest();
  const random = sfc32(
    digest.readUInt32LE(0),
    digest.readUInt32LE(4),
    digest.readUInt32LE(8),
    digest.readUInt32LE(12),
  );

  const components: number[] = [];
  while (components.length < dimension) {
    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - random();
    const u2 = random();
    const radius = Math.sqrt(-2 * Math.log(u1));
    components.push(radius * Math.cos(2 * Math.PI * u2));
    if (components.length < dimension) {
      components.push(radius * Math.sin(2 * Math.PI * u2));
    }
  }

  const unit = normalize(components);
  if (unit) {
    return unit;
  }

  // every sample was zero; practically unreachable, still must be unit length
  const basis = new Array<number>(dimension).fill(0);
  basis[digest[16] % dimension] = 1;
  return basis;
}
