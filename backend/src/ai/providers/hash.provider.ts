import { Injectable } from '@nestjs/common';
import {
  HASH_EMBEDDING_MODEL,
  hashEmbedding,
} from '../../embedding/hash-embedding.js';
import type { EmbedTextOptions, EmbedTextResult } from '../ai.types.js';
import type { AiProvider } from './ai-provider.js';

/**
 * Offline provider producing deterministic hash-derived vectors. Used when no
 * model service is configured; similarity between different texts is not
 * semantic.
 */
@Injectable()
export class HashEmbeddingProvider implements AiProvider {
  public readonly name = 'hash';
  public readonly embeddingModel = HASH_EMBEDDING_MODEL;

  constructor(private readonly defaultDimension: number) {}

  embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    const dimension = options.dimensions ?? this.defaultDimension;
    return Promise.resolve({
      embeddings: options.inputs.map((input) => hashEmbedding(input, dimension)),
      model: options.model ?? this.embeddingModel,
    });
  }
}
