import 'reflect-metadata';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import type { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AIService } from './ai/ai.service.js';
import { AppModule } from './app.module.js';
import { DatabaseService } from './database/database.service.js';
import { EmbedderService } from './embedding/embedder.service.js';
import { SearchEngineService } from './search/search-engine.service.js';
import { SimilarityRanker } from './search/similarity-ranker.js';

// esbuild-based loaders such as tsx emit no constructor parameter types
const injectables = [
  AIService,
  DatabaseService,
  EmbedderService,
  SearchEngineService,
  SimilarityRanker,
];

describe('AppModule', () => {
  let app: INestApplicationContext;

  beforeEach(async () => {
    for (const injectable of injectables) {
      Reflect.deleteMetadata('design:paramtypes', injectable);
    }
    app = await NestFactory.createApplicationContext(AppModule, { logger: false });
  });

  afterEach(async () => {
    await app.close();
  });

  it('boots without emitted parameter types and serves a search', async () => {
    const engine = app.get(SearchEngineService);

    const indexed = await engine.indexContent('note', {
      title: 'Release notes',
      body: 'Search results keep candidate order on ties.',
      category: 'docs',
    });
    expect(indexed.ok).toBe(true);

    const results = await engine.search({
      text: 'Release notes Search results keep candidate order on ties.',
      k: 1,
    });
    expect(results.map((result) => result.id)).toEqual(['note']);
    expect(results[0].score).toBeCloseTo(1, 6);
  });
});
