import { Inject, Injectable } from '@nestjs/common';
import { AI_PROVIDER_TOKEN } from './ai.constants.js';
import type { AiProvider } from './providers/ai-provider.js';
import type { EmbedTextOptions, EmbedTextResult } from './ai.types.js';

@Injectable()
export class AIService {
  constructor(
    @Inject(AI_PROVIDER_TOKEN) private readonly provider: AiProvider,
  ) {}

  get providerName(): string {
    return this.provider.name;
  }

  get embeddingModel(): string {
    return this.provider.embeddingModel;
  }

  embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    return this.provider.embedText(options);
  }
}
