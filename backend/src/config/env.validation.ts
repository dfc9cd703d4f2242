import { z } from 'zod';

const truthyValues = new Set(['true', '1', 'yes', 'y', 'on']);

const optionalPositiveInt = z.coerce.number().int().positive().optional();

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    AI_PROVIDER: z.enum(['openai']).default('openai'),
    OPENAI_API_KEY: z.string().trim().optional(),
    OPENAI_BASE_URL: z.string().trim().url().optional(),
    OPENAI_CHAT_MODEL: z.string().trim().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().trim().default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: optionalPositiveInt,
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(64),
    EMBEDDING_CONCURRENCY: z.coerce.number().int().positive().default(2),
    EMBEDDING_MAX_INPUT_TOKENS: z.coerce
      .number()
      .int()
      .positive()
      .default(8000),
    INDEX_STORE: z.enum(['memory', 'postgres']).default('memory'),
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
    INGEST_CONCURRENCY: z.coerce.number().int().positive().default(4),
    MAX_DOCUMENT_BYTES: z.coerce
      .number()
      .int()
      .positive()
      .default(20 * 1024 * 1024),
    OCR_LANG: z.string().trim().default('eng'),
    CHUNK_MAX_TOKENS: z.coerce.number().int().positive().default(256),
    CHUNK_OVERLAP_TOKENS: z.coerce.number().int().nonnegative().default(32),
    CHUNK_MIN_TOKENS: optionalPositiveInt,
    CHUNK_BOUNDARY_POLICY: z
      .enum(['sentence', 'paragraph', 'fixed'])
      .default('sentence'),
    RETRIEVAL_SEMANTIC_WEIGHT: z.coerce.number().nonnegative().default(0.5),
    RETRIEVAL_LEXICAL_WEIGHT: z.coerce.number().nonnegative().default(0.5),
    RETRIEVAL_CANDIDATE_MULTIPLIER: z.coerce
      .number()
      .int()
      .positive()
      .default(2),
    RETRIEVAL_DEFAULT_TOP_K: z.coerce.number().int().positive().default(6),
    RETRIEVAL_TIE_BREAK: z
      .enum(['sequence-index', 'chunk-id'])
      .default('sequence-index'),
    PROMPT_CONTEXT_TOKENS: z.coerce.number().int().positive().default(1500),
    PROMPT_TEMPLATE_PATH: z.string().trim().optional(),
    GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    GENERATION_MAX_OUTPUT_TOKENS: optionalPositiveInt,
    GENERATION_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
    GENERATION_BASE_DELAY_MS: z.coerce.number().int().positive().default(500),
    GENERATION_MAX_DELAY_MS: z.coerce.number().int().positive().default(8000),
    GENERATION_DEADLINE_MS: z.coerce.number().int().positive().default(60000),
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
    if (env.INDEX_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when INDEX_STORE=postgres',
      });
    }
    if (env.CHUNK_OVERLAP_TOKENS >= env.CHUNK_MAX_TOKENS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP_TOKENS'],
        message: 'CHUNK_OVERLAP_TOKENS must be smaller than CHUNK_MAX_TOKENS',
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
