import { z } from 'zod';

const truthyValues = new Set(['true', '1', 'yes', 'y', 'on']);

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    AI_PROVIDER: z.enum(['hash', 'openai']).default('hash'),
    OPENAI_API_KEY: z.string().trim().optional(),
    OPENAI_EMBEDDING_MODEL: z
      .string()
      .trim()
      .default('text-embedding-3-small'),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(384),
    EMBEDDING_CACHE_SIZE: z.coerce.number().int().nonnegative().default(10000),
    CONTENT_STORE: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().trim().optional(),
    DATABASE_SSL: z
      .preprocess((value) => {
        if (typeof value === 'string') {
          const normalized = value.trim().toLowerCase();
          if (normalized.length === 0) {
            return undefined;
          }
          return truthyValues.has(normalized);
        }
        if (typeof value === 'number') {
          return value === 1;
        }
        return value;
      }, z.boolean().optional())
      .optional(),
    SEARCH_DEFAULT_LIMIT: z.coerce.number().int().positive().default(10),
    SEARCH_BODY_PREVIEW_LENGTH: z.coerce
      .number()
      .int()
      .positive()
      .default(200),
    SEARCH_TAG_PREVIEW_LIMIT: z.coerce.number().int().nonnegative().default(5),
  })
  .superRefine((env, ctx) => {
    if (
      env.AI_PROVIDER === 'openai' &&
      !env.OPENAI_API_KEY &&
      env.NODE_ENV !== 'test'
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message:
          'OPENAI_API_KEY is required when AI_PROVIDER=openai outside of test environment',
      });
    }
    if (env.CONTENT_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when CONTENT_STORE=postgres',
      });
    }
  });

export type EnvSchema = z.infer<typeof envSchema>;

export const validateEnv = (config: Record<string, unknown>): EnvSchema => {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const messages = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration validation failed - ${messages}`);
  }
  return parsed.data;
};
