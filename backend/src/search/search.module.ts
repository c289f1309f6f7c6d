import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig, SearchConfig } from '../config/index.js';
import { ContentModule } from '../content/index.js';
import { EmbeddingModule } from '../embedding/index.js';
import { SearchEngineService } from './search-engine.service.js';
import { SEARCH_OPTIONS_TOKEN } from './search.constants.js';
import type { SearchOptions } from './search.types.js';
import { SimilarityRanker } from './similarity-ranker.js';

@Module({
  imports: [EmbeddingModule, ContentModule],
  providers: [
    {
      provide: SEARCH_OPTIONS_TOKEN,
      useFactory: (configService: ConfigService<AppConfig>): SearchOptions => {
        const searchConfig = configService.get<SearchConfig>('search');
        if (!searchConfig) {
          throw new Error('Search configuration is missing');
        }
        return searchConfig;
      },
      inject: [ConfigService],
    },
    SimilarityRanker,
    SearchEngineService,
  ],
  exports: [SearchEngineService],
})
export class SearchModule {}
