import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  AppConfig,
  ContentConfig,
  EmbeddingConfig,
} from '../config/index.js';
import { DatabaseModule, DatabaseService } from '../database/index.js';
import { CONTENT_STORE_TOKEN, type ContentStore } from './content.store.js';
import { InMemoryContentStore } from './in-memory-content.store.js';
import { PostgresContentStore } from './postgres-content.store.js';

@Module({
  imports: [DatabaseModule],
  providers: [
    {
      provide: CONTENT_STORE_TOKEN,
      useFactory: (
        configService: ConfigService<AppConfig>,
        database: DatabaseService,
      ): ContentStore => {
        const contentConfig = configService.get<ContentConfig>('content');
        const embeddingConfig = configService.get<EmbeddingConfig>('embedding');

        if (!contentConfig || !embeddingConfig) {
          throw new Error('Content store configuration is missing');
        }

        const options = { dimension: embeddingConfig.dimension };
        switch (contentConfig.store) {
          case 'postgres':
            return new PostgresContentStore(database, options);
          case 'memory':
            return new InMemoryContentStore(options);
          default: {
            const store: string = contentConfig.store;
            throw new Error(`Unsupported content store: ${store}`);
          }
        }
      },
      inject: [ConfigService, DatabaseService],
    },
  ],
  exports: [CONTENT_STORE_TOKEN],
})
export class ContentModule {}
