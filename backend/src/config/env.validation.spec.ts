import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { configuration } from './configuration.js';
import { validateEnv } from './env.validation.js';

describe('validateEnv', () => {
  it('applies defaults to an empty environment', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'development',
      AI_PROVIDER: 'hash',
      OPENAI_EMBEDDING_MODEL: 'text-embedding-3-small',
      EMBEDDING_DIMENSION: 384,
      EMBEDDING_CACHE_SIZE: 10000,
      CONTENT_STORE: 'memory',
      SEARCH_DEFAULT_LIMIT: 10,
      SEARCH_BODY_PREVIEW_LENGTH: 200,
      SEARCH_TAG_PREVIEW_LIMIT: 5,
    });
  });

  it('coerces numbers and boolean flags from strings', () => {
    const env = validateEnv({
      EMBEDDING_DIMENSION: '64',
      EMBEDDING_CACHE_SIZE: '0',
      DATABASE_SSL: ' Yes ',
    });

    expect(env.EMBEDDING_DIMENSION).toBe(64);
    expect(env.EMBEDDING_CACHE_SIZE).toBe(0);
    expect(env.DATABASE_SSL).toBe(true);
    expect(validateEnv({ DATABASE_SSL: 'off' }).DATABASE_SSL).toBe(false);
    expect(validateEnv({ DATABASE_SSL: '' }).DATABASE_SSL).toBeUndefined();
  });

  it('requires an API key for the openai provider outside of tests', () => {
    expect(() => validateEnv({ NODE_ENV: 'production', AI_PROVIDER: 'openai' })).toThrow(
      'Configuration validation failed - OPENAI_API_KEY: OPENAI_API_KEY is required when AI_PROVIDER=openai outside of test environment',
    );
    expect(validateEnv({ NODE_ENV: 'test', AI_PROVIDER: 'openai' }).AI_PROVIDER).toBe('openai');
  });

  it('requires a database URL for the postgres store', () => {
    expect(() => validateEnv({ CONTENT_STORE: 'postgres' })).toThrow(
      'Configuration validation failed - DATABASE_URL: DATABASE_URL is required when CONTENT_STORE=postgres',
    );
  });

  it('rejects a non-positive default limit', () => {
    expect(() => validateEnv({ SEARCH_DEFAULT_LIMIT: '0' })).toThrow(
      /^Configuration validation failed - SEARCH_DEFAULT_LIMIT: /,
    );
  });

  it('rejects a non-positive embedding dimension', () => {
    expect(() => validateEnv({ EMBEDDING_DIMENSION: '0' })).toThrow(
      /^Configuration validation failed - EMBEDDING_DIMENSION: /,
    );
  });
});

describe('configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { NODE_ENV: 'test' };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('groups the environment into sections', () => {
    process.env.AI_PROVIDER = 'openai';
    process.env.OPENAI_API_KEY = 'test-key';
    process.env.CONTENT_STORE = 'postgres';
    process.env.DATABASE_URL = 'postgres://localhost:5432/test';
    process.env.SEARCH_DEFAULT_LIMIT = '25';

    expect(configuration()).toEqual({
      app: { nodeEnv: 'test' },
      ai: {
        provider: 'openai',
        openai: { apiKey: 'test-key', embeddingModel: 'text-embedding-3-small' },
      },
      embedding: { dimension: 384, cacheSize: 10000 },
      database: { url: 'postgres://localhost:5432/test', ssl: false },
      content: { store: 'postgres' },
      search: {
        defaultLimit: 25,
        bodyPreviewLength: 200,
        tagPreviewLimit: 5,
      },
    });
  });
});
