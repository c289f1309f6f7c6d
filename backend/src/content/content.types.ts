import type { EmbeddingVector } from '../embedding/embedding.types.js';

export interface ContentFields {
  title: string;
  body: string;
  category: string;
  tags?: string[];
  author?: string;
  createdAt?: Date;
  metadata?: Record<string, unknown>;
  /** Precomputed vector; when absent the engine embeds `title + " " + body`. */
  embedding?: EmbeddingVector;
}

export interface ContentRecord {
  id: string;
  title: string;
  body: string;
  category: string;
  tags: string[];
  author: string;
  createdAt: Date;
  embedding: EmbeddingVector;
  /** Embedder configuration that produced `embedding`. */
  embeddingModel: string;
  metadata: Record<string, unknown>;
}

/** Shape handed to ContentStore.put; the store rejects it unless complete. */
export type ContentRecordDraft = Omit<
  ContentRecord,
  'id' | 'embedding' | 'metadata'
> & {
  embedding?: EmbeddingVector;
  metadata?: Record<string, unknown>;
};
