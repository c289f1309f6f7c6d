import { Injectable, Logger } from '@nestjs/common';
import { createOpenAI } from '@ai-sdk/openai';
import { embedMany } from 'ai';
import type { AiConfig } from '../../config/index.js';
import type { EmbedTextOptions, EmbedTextResult } from '../ai.types.js';
import type { AiProvider } from './ai-provider.js';

type EmbedManyParams = Parameters<typeof embedMany>[0];

@Injectable()
export class OpenAiProvider implements AiProvider {
  public readonly name = 'openai';

  private readonly logger = new Logger(OpenAiProvider.name);
  private readonly client: ReturnType<typeof createOpenAI>;

  constructor(private readonly config: AiConfig['openai']) {
    this.client = this.createClient();
    this.logger.log(
      `OpenAI provider initialized with embedding model: ${this.embeddingModel}`,
    );
  }

  get embeddingModel(): string {
    return this.config.embeddingModel;
  }

  async embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    const modelName = options.model ?? this.embeddingModel;
    try {
      const embeddingOptions: EmbedManyParams = {
        model: this.client.embedding(modelName),
        values: options.inputs,
      };

      // only the text-embedding-3 family accepts a target size
      if (options.dimensions !== undefined) {
        embeddingOptions.providerOptions = {
          openai: { dimensions: options.dimensions },
        };
      }

      const result = await embedMany(embeddingOptions);

      return {
        embeddings: result.embeddings.map((embedding) => Array.from(embedding)),
        model: modelName,
        raw: result,
      };
    } catch (error) {
      this.logger.error(
        'OpenAI embedding failed',
        error instanceof Error ? error.stack : error,
      );
      throw error;
    }
  }

  private createClient() {
    if (!this.config.apiKey) {
      throw new Error('OpenAI API key is not configured');
    }

    return createOpenAI({
      apiKey: this.config.apiKey,
    });
  }
}
