import { validateEnv, type EnvSchema } from './env.validation.js';
import type { RagSettings } from './rag-settings.js';

export type AppConfig = ReturnType<typeof buildConfiguration>;

// validate() on the ConfigModule has already run against the same env
export const configuration = () => buildConfiguration(validateEnv(process.env));

export function buildConfiguration(env: EnvSchema) {
  const rag: RagSettings = {
    chunking: {
      maxTokens: env.CHUNK_MAX_TOKENS,
      overlapTokens: env.CHUNK_OVERLAP_TOKENS,
      minTokens: env.CHUNK_MIN_TOKENS,
      boundaryPolicy: env.CHUNK_BOUNDARY_POLICY,
    },
    retrieval: {
      semanticWeight: env.RETRIEVAL_SEMANTIC_WEIGHT,
      lexicalWeight: env.RETRIEVAL_LEXICAL_WEIGHT,
      candidateMultiplier: env.RETRIEVAL_CANDIDATE_MULTIPLIER,
      defaultTopK: env.RETRIEVAL_DEFAULT_TOP_K,
      tieBreak: env.RETRIEVAL_TIE_BREAK,
    },
    prompt: {
      templateId: env.PROMPT_TEMPLATE_PATH ? 'custom' : 'grounded-answer',
      contextTokenBudget: env.PROMPT_CONTEXT_TOKENS,
    },
    generation: {
      temperature: env.GENERATION_TEMPERATURE,
      maxOutputTokens: env.GENERATION_MAX_OUTPUT_TOKENS,
      maxRetries: env.GENERATION_MAX_RETRIES,
      baseDelayMs: env.GENERATION_BASE_DELAY_MS,
      maxDelayMs: env.GENERATION_MAX_DELAY_MS,
      deadlineMs: env.GENERATION_DEADLINE_MS,
    },
  };

  return {
    app: {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      logLevel: env.LOG_LEVEL,
    },
    ai: {
      provider: env.AI_PROVIDER,
      openai: {
        apiKey: env.OPENAI_API_KEY,
        baseUrl: env.OPENAI_BASE_URL,
        chatModel: env.OPENAI_CHAT_MODEL,
        embeddingModel: env.OPENAI_EMBEDDING_MODEL,
        embeddingDimensions: env.EMBEDDING_DIMENSIONS,
      },
    },
    embedding: {
      batchSize: env.EMBEDDING_BATCH_SIZE,
      concurrency: env.EMBEDDING_CONCURRENCY,
      dimensions: env.EMBEDDING_DIMENSIONS,
      maxInputTokens: env.EMBEDDING_MAX_INPUT_TOKENS,
    },
    index: {
      store: env.INDEX_STORE,
    },
    database: {
      url: env.DATABASE_URL,
      ssl: env.DATABASE_SSL ?? false,
    },
    ingestion: {
      concurrency: env.INGEST_CONCURRENCY,
      maxDocumentBytes: env.MAX_DOCUMENT_BYTES,
      ocrLang: env.OCR_LANG,
    },
    prompt: {
      templatePath: env.PROMPT_TEMPLATE_PATH,
    },
    rag,
  };
}

export type AiConfig = AppConfig['ai'];
export type EmbeddingConfig = AppConfig['embedding'];
export type IndexConfig = AppConfig['index'];
export type DatabaseConfig = AppConfig['database'];
export type IngestionConfig = AppConfig['ingestion'];
export type PromptConfig = AppConfig['prompt'];
