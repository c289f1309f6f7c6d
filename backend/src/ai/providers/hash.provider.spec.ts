import { describe, expect, it } from '@jest/globals';
import {
  HASH_EMBEDDING_MODEL,
  hashEmbedding,
} from '../../embedding/hash-embedding.js';
import { AIService } from '../ai.service.js';
import { HashEmbeddingProvider } from './hash.provider.js';

describe('HashEmbeddingProvider', () => {
  it('embeds every input with the requested dimension', async () => {
    const provider = new HashEmbeddingProvider(16);

    const result = await provider.embedText({ inputs: ['alpha', 'beta'], dimensions: 4 });

    expect(result.model).toBe(HASH_EMBEDDING_MODEL);
    expect(result.embeddings).toEqual([hashEmbedding('alpha', 4), hashEmbedding('beta', 4)]);
  });

  it('falls back to its default dimension', async () => {
    const provider = new HashEmbeddingProvider(16);

    const { embeddings } = await provider.embedText({ inputs: ['alpha'] });

    expect(embeddings[0]).toHaveLength(16);
  });

  it('is exposed through AIService', async () => {
    const service = new AIService(new HashEmbeddingProvider(8));

    expect(service.providerName).toBe('hash');
    expect(service.embeddingModel).toBe(HASH_EMBEDDING_MODEL);
    const { embeddings } = await service.embedText({ inputs: ['alpha'] });
    expect(embeddings).toEqual([hashEmbedding('alpha', 8)]);
  });
});
