import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AIService, AiModule } from '../ai/index.js';
import type { AppConfig, EmbeddingConfig } from '../config/index.js';
import { EmbedderService } from './embedder.service.js';

@Module({
  imports: [AiModule],
  providers: [
    {
      provide: EmbedderService,
      useFactory: (
        configService: ConfigService<AppConfig>,
        aiService: AIService,
      ) => {
        const embeddingConfig = configService.get<EmbeddingConfig>('embedding');
        if (!embeddingConfig) {
          throw new Error('Embedding configuration is missing');
        }
        return new EmbedderService(
          {
            dimension: embeddingConfig.dimension,
            cacheSize: embeddingConfig.cacheSize,
          },
          aiService,
        );
      },
      inject: [ConfigService, AIService],
    },
  ],
  exports: [EmbedderService],
})
export class EmbeddingModule {}
