import { Injectable, Logger } from '@nestjs/common';
import type { EmbedTextOptions, EmbedTextResult } from '../ai/ai.types.js';
import { EmbeddingCache } from './embedding-cache.js';
import type {
  EmbedderOptions,
  EmbeddingCacheStats,
  EmbeddingVector,
} from './embedding.types.js';
import { hashEmbedding } from './hash-embedding.js';
import { cosineSimilarity, l2Norm, normalize } from './vector-math.js';

// backend vectors this close to unit length are kept bit-for-bit
const UNIT_NORM_TOLERANCE = 1e-12;

/** What the embedder needs from a model service; AIService satisfies it. */
export interface EmbeddingBackend {
  readonly providerName: string;
  readonly embeddingModel: string;
  embedText(options: EmbedTextOptions): Promise<EmbedTextResult>;
}

/**
 * Text to fixed-dimension unit vectors, with an owned cache keyed by the
 * exact text.
 *
 * Never rejects: whatever the backend does wrong (throws, returns the wrong
 * length, returns a zero vector) is replaced by the hash embedding of the
 * text. Those substitutes are not cached, so a cached vector is always what
 * the backend itself produced for the current configuration.
 */
@Injectable()
export class EmbedderService {
  private readonly logger = new Logger(EmbedderService.name);
  private readonly cache: EmbeddingCache;
  private options: EmbedderOptions;
  // bumped on every configuration change so late results are not cached
  private generation = 0;

  constructor(
    options: EmbedderOptions,
    private readonly backend: EmbeddingBackend,
  ) {
    this.assertDimension(options.dimension);
    this.options = { ...options };
    this.cache = new EmbeddingCache(options.cacheSize);
  }

  get dimension(): number {
    return this.options.dimension;
  }

  /** Identifier stored alongside vectors so differently-produced ones are never compared. */
  get model(): string {
    const model = this.options.model ?? this.backend.embeddingModel;
    return `${this.backend.providerName}:${model}@${this.options.dimension}`;
  }

  /**
   * Switch model and/or dimension. The cache is emptied only when either
   * actually changes.
   */
  configure(changes: Partial<Pick<EmbedderOptions, 'model' | 'dimension'>>): void {
    const next: EmbedderOptions = { ...this.options, ...changes };
    this.assertDimension(next.dimension);

    if (next.model === this.options.model && next.dimension === this.options.dimension) {
      return;
    }

    this.options = next;
    this.generation++;
    this.cache.clear();
    this.logger.log(`Embedder reconfigured to ${this.model}, cache cleared`);
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const cached = this.cache.get(text);
    if (cached) {
      return [...cached];
    }

    const [vector] = await this.computeMisses([text]);
    return [...vector];
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    const vectors = new Map<string, EmbeddingVector>();
    const misses = new Set<string>();

    for (const text of texts) {
      if (vectors.has(text) || misses.has(text)) {
        continue;
      }
      const cached = this.cache.get(text);
      if (cached) {
        vectors.set(text, cached);
      } else {
        misses.add(text);
      }
    }

    if (misses.size > 0) {
      const pending = [...misses];
      const computed = await this.computeMisses(pending);
      pending.forEach((text, index) => vectors.set(text, computed[index]));
    }

    return texts.map((text) => [...(vectors.get(text) ?? this.fallback(text))]);
  }

  /** Cosine similarity; 0 for zero-norm, mismatched or non-finite vectors. */
  similarity(a: readonly number[], b: readonly number[]): number {
    try {
      return cosineSimilarity(a, b);
    } catch (error) {
      this.logger.debug(
        `Similarity undefined, scoring 0: ${error instanceof Error ? error.message : String(error)}`,
      );
      return 0;
    }
  }

  cacheStats(): EmbeddingCacheStats {
    return this.cache.stats();
  }

  private async computeMisses(texts: string[]): Promise<EmbeddingVector[]> {
    const generation = this.generation;
    const { dimension, model } = this.options;

    // model services reject blank input; the hash scheme handles it
    const remote = texts.filter((text) => text.trim().length > 0);
    let remoteVectors: (EmbeddingVector | null)[] = [];

    if (remote.length > 0) {
      try {
        const result = await this.backend.embedText({
          inputs: remote,
          model,
          dimensions: dimension,
        });
        remoteVectors = remote.map((_, index) =>
          this.acceptVector(result.embeddings[index], dimension),
        );
      } catch (error) {
        this.logger.warn(
          `Embedding backend failed for ${remote.length} text(s), using hash fallback: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
        remoteVectors = remote.map(() => null);
      }
    }

    const byText = new Map<string, EmbeddingVector | null>();
    remote.forEach((text, index) => byText.set(text, remoteVectors[index] ?? null));

    return texts.map((text) => {
      const fromBackend = byText.get(text);
      if (fromBackend) {
        if (generation === this.generation) {
          this.cache.set(text, fromBackend);
        }
        return fromBackend;
      }

      const vector = hashEmbedding(text, dimension);
      // blank text never reaches the backend, so this is its canonical vector
      if (text.trim().length === 0 && generation === this.generation) {
        this.cache.set(text, vector);
      }
      return vector;
    });
  }

  private acceptVector(
    vector: number[] | undefined,
    dimension: number,
  ): EmbeddingVector | null {
    if (!vector || vector.length !== dimension) {
      this.logger.warn(
        `Embedding backend returned ${vector?.length ?? 'no'} components, expected ${dimension}; using hash fallback`,
      );
      return null;
    }
    const norm = l2Norm(vector);
    if (Number.isFinite(norm) && Math.abs(norm - 1) <= UNIT_NORM_TOLERANCE) {
      return [...vector];
    }
    const unit = normalize(vector);
    if (!unit) {
      this.logger.warn('Embedding backend returned a degenerate vector; using hash fallback');
    }
    return unit;
  }

  private fallback(text: string): EmbeddingVector {
    return hashEmbedding(text, this.options.dimension);
  }

  private assertDimension(dimension: number): void {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(
        `Embedding dimension must be a positive integer, got ${dimension}`,
      );
    }
  }
}
