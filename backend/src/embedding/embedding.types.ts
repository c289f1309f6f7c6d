/** A dense, unit-length vector representing a text's semantic position. */
export type EmbeddingVector = number[];

export interface EmbedderOptions {
  /** Number of components in every vector the embedder returns. */
  dimension: number;
  /** Maximum cached texts; 0 keeps every entry. */
  cacheSize: number;
  /** Model override passed to the provider; defaults to the provider's own. */
  model?: string;
}

export interface EmbeddingCacheStats {
  hits: number;
  misses: number;
  size: number;
}
