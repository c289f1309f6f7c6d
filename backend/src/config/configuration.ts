import { validateEnv } from './env.validation.js';

export type AppConfig = ReturnType<typeof configuration>;

export const configuration = () => {
  // validate() in ConfigModule has already rejected a bad environment;
  // parsing again here gives us the defaults and coerced numbers.
  const env = validateEnv(process.env);

  return {
    app: {
      nodeEnv: env.NODE_ENV,
    },
    ai: {
      provider: env.AI_PROVIDER,
      openai: {
        apiKey: env.OPENAI_API_KEY,
        embeddingModel: env.OPENAI_EMBEDDING_MODEL,
      },
    },
    embedding: {
      dimension: env.EMBEDDING_DIMENSION,
      cacheSize: env.EMBEDDING_CACHE_SIZE,
    },
    database: {
      url: env.DATABASE_URL,
      ssl: env.DATABASE_SSL ?? false,
    },
    content: {
      store: env.CONTENT_STORE,
    },
    search: {
      defaultLimit: env.SEARCH_DEFAULT_LIMIT,
      bodyPreviewLength: env.SEARCH_BODY_PREVIEW_LENGTH,
      tagPreviewLimit: env.SEARCH_TAG_PREVIEW_LIMIT,
    },
  };
};

export type AiConfig = AppConfig['ai'];
export type EmbeddingConfig = AppConfig['embedding'];
export type DatabaseConfig = AppConfig['database'];
export type ContentConfig = AppConfig['content'];
export type SearchConfig = AppConfig['search'];
