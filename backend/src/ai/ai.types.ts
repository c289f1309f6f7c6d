export interface EmbedTextOptions {
  model?: string;
  inputs: string[];
  /** Requested vector length; providers that cannot honour it return their native size. */
  dimensions?: number;
}

export interface EmbedTextResult {
  embeddings: number[][];
  model: string;
  raw?: unknown;
}
