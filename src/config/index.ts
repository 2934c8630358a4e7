/**
 * Configuration
 * Typed settings parsed from environment variables.
 */

import { join } from 'path';
import { z } from 'zod';
import { ValidationError } from '../rag/errors.js';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

function envBoolean(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return defaultValue;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.includes(normalized)) return true;
      if (FALSE_VALUES.includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
      return z.NEVER;
    });
}

function envNumber(defaultValue: number, { min, max, int = false }: { min?: number; max?: number; int?: boolean } = {}) {
  let schema = z.coerce.number();
  if (int) schema = schema.int();
  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);
  return z.preprocess((value) => (value === undefined || value === '' ? defaultValue : value), schema);
}

function envString(defaultValue: string) {
  return z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? defaultValue : value));
}

const envSchema = z.object({
  // Chunking
  CHUNK_SIZE: envNumber(512, { min: 1, int: true }),
  CHUNK_OVERLAP: envNumber(50, { min: 0, int: true }),

  // Ingestion
  MAX_WORKERS: envNumber(4, { min: 1, int: true }),
  EMBED_BATCH_SIZE: envNumber(64, { min: 1, int: true }),
  MAX_UPLOAD_MB: envNumber(50, { min: 0.001 }),
  PDF_MIN_PAGE_TEXT_CHARS: envNumber(25, { min: 0, int: true }),
  PDF_RENDER_SCALE: envNumber(1.5, { min: 0.1 }),

  // Cache
  CACHE_ENABLED: envBoolean(true),
  CACHE_TTL: envNumber(3600, { min: 0 }),
  CACHE_MAX_ENTRIES: envNumber(500, { min: 1, int: true }),

  // Capability calls
  QUERY_TIMEOUT: envNumber(30, { min: 0 }),
  CAPABILITY_RETRIES: envNumber(2, { min: 0, int: true }),
  RETRY_BACKOFF_MS: envNumber(500, { min: 0 }),

  // Retrieval
  DEFAULT_N_RESULTS: envNumber(5, { min: 1, int: true }),
  MAX_N_RESULTS: envNumber(100, { min: 1, int: true }),
  RERANK_BY_DEFAULT: envBoolean(false),
  SEMANTIC_WEIGHT: envNumber(0.7, { min: 0, max: 1 }),
  KEYWORD_WEIGHT: envNumber(0.3, { min: 0, max: 1 }),
  LEXICAL_SCAN_LIMIT: envNumber(10_000, { min: 1, int: true }),
  EXPANSION_VARIANTS: envNumber(3, { min: 1, max: 10, int: true }),

  // Reranking
  RERANK_RELEVANCE_WEIGHT: envNumber(0.7, { min: 0, max: 1 }),
  RERANK_RECENCY_WEIGHT: envNumber(0.15, { min: 0, max: 1 }),
  RERANK_LENGTH_WEIGHT: envNumber(0.15, { min: 0, max: 1 }),
  RERANK_RECENCY_HALF_LIFE_DAYS: envNumber(30, { min: 0.001 }),
  RERANK_IDEAL_MIN_CHARS: envNumber(100, { min: 0, int: true }),
  RERANK_IDEAL_MAX_CHARS: envNumber(1000, { min: 1, int: true }),

  // Embeddings
  EMBEDDING_PROVIDER: z.enum(['local', 'openai', 'google']).default('local'),
  EMBEDDING_MODEL: envString('text-embedding-3-small'),
  EMBEDDING_FALLBACK: envBoolean(true),
  LOCAL_EMBEDDING_DIMENSIONS: envNumber(384, { min: 1, int: true }),

  // LLM
  LLM_PROVIDER: z.enum(['none', 'anthropic', 'openai']).default('none'),
  MAIN_MODEL: envString(''),
  FAST_MODEL: envString(''),

  // Vector store
  VECTOR_STORE: z.enum(['memory', 'lancedb']).default('memory'),
  LANCEDB_PATH: envString(join(process.cwd(), 'data', 'rag', 'vectors.lance')),

  // API keys
  ANTHROPIC_API_KEY: envString(''),
  OPENAI_API_KEY: envString(''),
  OPENAI_BASE_URL: envString('https://api.openai.com/v1'),
  GOOGLE_API_KEY: envString(''),
});

export type EmbeddingProviderName = 'local' | 'openai' | 'google';
export type LLMProviderName = 'none' | 'anthropic' | 'openai';

export interface RAGConfig {
  chunkSize: number;
  chunkOverlap: number;

  maxWorkers: number;
  embedBatchSize: number;
  maxDocumentBytes: number;
  pdfMinPageTextChars: number;
  pdfRenderScale: number;

  cacheEnabled: boolean;
  cacheTtlMs: number;
  cacheMaxEntries: number;

  capabilityTimeoutMs: number;
  capabilityRetries: number;
  retryBackoffMs: number;

  defaultNResults: number;
  maxNResults: number;
  rerankByDefault: boolean;
  semanticWeight: number;
  lexicalWeight: number;
  lexicalScanLimit: number;
  expansionVariants: number;

  rerankRelevanceWeight: number;
  rerankRecencyWeight: number;
  rerankLengthWeight: number;
  recencyHalfLifeDays: number;
  /** Chunk lengths between these bounds get the full length factor */
  rerankIdealMinChars: number;
  rerankIdealMaxChars: number;

  embeddingProvider: EmbeddingProviderName;
  embeddingModel: string;
  embeddingFallback: boolean;
  localEmbeddingDimensions: number;

  llmProvider: LLMProviderName;
  mainModel: string;
  fastModel: string;

  vectorStore: 'memory' | 'lancedb';
  lanceDbPath: string;

  anthropicApiKey: string;
  openaiApiKey: string;
  openaiBaseUrl: string;
  googleApiKey: string;
}

const DEFAULT_MODELS: Record<LLMProviderName, { main: string; fast: string }> = {
  none: { main: '', fast: '' },
  anthropic: { main: 'claude-sonnet-4-20250514', fast: 'claude-3-5-haiku-20241022' },
  openai: { main: 'gpt-4o', fast: 'gpt-4o-mini' },
};

/**
 * Parse configuration from environment variables. Unset variables take
 * their defaults; invalid values throw a ValidationError naming each one.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RAGConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ValidationError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  if (e.CHUNK_OVERLAP >= e.CHUNK_SIZE) {
    throw new ValidationError(
      `Invalid configuration: CHUNK_OVERLAP (${e.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${e.CHUNK_SIZE})`
    );
  }

  if (e.RERANK_IDEAL_MIN_CHARS > e.RERANK_IDEAL_MAX_CHARS) {
    throw new ValidationError(
      `Invalid configuration: RERANK_IDEAL_MIN_CHARS (${e.RERANK_IDEAL_MIN_CHARS}) must not exceed RERANK_IDEAL_MAX_CHARS (${e.RERANK_IDEAL_MAX_CHARS})`
    );
  }

  return {
    chunkSize: e.CHUNK_SIZE,
    chunkOverlap: e.CHUNK_OVERLAP,

    maxWorkers: e.MAX_WORKERS,
    embedBatchSize: e.EMBED_BATCH_SIZE,
    maxDocumentBytes: Math.round(e.MAX_UPLOAD_MB * 1024 * 1024),
    pdfMinPageTextChars: e.PDF_MIN_PAGE_TEXT_CHARS,
    pdfRenderScale: e.PDF_RENDER_SCALE,

    cacheEnabled: e.CACHE_ENABLED,
    cacheTtlMs: e.CACHE_TTL * 1000,
    cacheMaxEntries: e.CACHE_MAX_ENTRIES,

    capabilityTimeoutMs: e.QUERY_TIMEOUT * 1000,
    capabilityRetries: e.CAPABILITY_RETRIES,
    retryBackoffMs: e.RETRY_BACKOFF_MS,

    defaultNResults: e.DEFAULT_N_RESULTS,
    maxNResults: e.MAX_N_RESULTS,
    rerankByDefault: e.RERANK_BY_DEFAULT,
    semanticWeight: e.SEMANTIC_WEIGHT,
    lexicalWeight: e.KEYWORD_WEIGHT,
    lexicalScanLimit: e.LEXICAL_SCAN_LIMIT,
    expansionVariants: e.EXPANSION_VARIANTS,

    rerankRelevanceWeight: e.RERANK_RELEVANCE_WEIGHT,
    rerankRecencyWeight: e.RERANK_RECENCY_WEIGHT,
    rerankLengthWeight: e.RERANK_LENGTH_WEIGHT,
    recencyHalfLifeDays: e.RERANK_RECENCY_HALF_LIFE_DAYS,
    rerankIdealMinChars: e.RERANK_IDEAL_MIN_CHARS,
    rerankIdealMaxChars: e.RERANK_IDEAL_MAX_CHARS,

    embeddingProvider: e.EMBEDDING_PROVIDER,
    embeddingModel: e.EMBEDDING_MODEL,
    embeddingFallback: e.EMBEDDING_FALLBACK,
    localEmbeddingDimensions: e.LOCAL_EMBEDDING_DIMENSIONS,

    llmProvider: e.LLM_PROVIDER,
    mainModel: e.MAIN_MODEL || DEFAULT_MODELS[e.LLM_PROVIDER].main,
    fastModel: e.FAST_MODEL || DEFAULT_MODELS[e.LLM_PROVIDER].fast,

    vectorStore: e.VECTOR_STORE,
    lanceDbPath: e.LANCEDB_PATH,

    anthropicApiKey: e.ANTHROPIC_API_KEY,
    openaiApiKey: e.OPENAI_API_KEY,
    openaiBaseUrl: e.OPENAI_BASE_URL,
    googleApiKey: e.GOOGLE_API_KEY,
  };
}

export const DEFAULT_RAG_CONFIG: RAGConfig = loadConfig({});
