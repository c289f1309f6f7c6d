import type { ContentFields, ContentRecord } from '../content/content.types.js';
import type { EmbeddingVector } from '../embedding/embedding.types.js';

export interface SearchQuery {
  /** Required unless `vector` is given; an empty string is a valid query. */
  text?: string;
  /** Precomputed query vector, used verbatim. */
  vector?: EmbeddingVector;
  /** Maximum number of results; values <= 0 yield no results. */
  k?: number;
  /** Exact-match category filter. */
  category?: string;
}

export interface SearchResult {
  id: string;
  title: string;
  /** Body preview, cut to the configured length. */
  body: string;
  category: string;
  tags: string[];
  author: string;
  createdAt: Date;
  /** Cosine similarity to the query, higher is closer. */
  score: number;
  /** Always 1 - score. */
  distance: number;
}

export interface RankOptions {
  category?: string;
  limit: number;
}

export interface SearchOptions {
  defaultLimit: number;
  bodyPreviewLength: number;
  tagPreviewLimit: number;
}

export type IndexFailureReason = 'EMBEDDING_FAILED' | 'STORAGE_FAILED';

export type IndexContentResult =
  | { ok: true; record: ContentRecord }
  | {
      ok: false;
      reason: IndexFailureReason;
      /** False when repeating the same call cannot succeed. */
      retryable: boolean;
      message: string;
    };

export interface IndexContentItem {
  id: string;
  fields: ContentFields;
}
