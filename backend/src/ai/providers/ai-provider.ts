import type { EmbedTextOptions, EmbedTextResult } from '../ai.types.js';

export interface AiProvider {
  readonly name: string;
  /** Model used when a call does not name one. */
  readonly embeddingModel: string;
  embedText(options: EmbedTextOptions): Promise<EmbedTextResult>;
}
