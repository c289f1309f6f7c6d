import type { EmbeddingCacheStats, EmbeddingVector } from './embedding.types.js';

/**
 * Text-to-vector cache keyed by the exact input text.
 *
 * Least-recently-used entries are evicted once `capacity` is exceeded; a
 * capacity of 0 disables eviction. Map iteration order doubles as the
 * recency list.
 */
export class EmbeddingCache {
  private readonly entries = new Map<string, EmbeddingVector>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Cache capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  get(text: string): EmbeddingVector | undefined {
    const vector = this.entries.get(text);
    if (vector === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    this.entries.delete(text);
    this.entries.set(text, vector);
    return vector;
  }

  set(text: string, vector: EmbeddingVector): void {
    this.entries.delete(text);
    this.entries.set(text, vector);

    if (this.capacity === 0) {
      return;
    }
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): EmbeddingCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}
