// ABOUTME: Typed application configuration parsed from environment variables with zod.
// ABOUTME: Numbers and booleans are coerced from strings; missing keys fall back to defaults.
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  PORT: z.coerce.number().int().positive().default(3000),

  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_EMBEDDINGS_MODEL: z.string().min(1).default('text-embedding-3-small'),

  RAG_ENABLED: booleanFlag.default('true'),
  RAG_EMBEDDING_BATCH_SIZE: z.coerce.number().int().min(1).max(2048).default(100),
  RAG_EMBEDDING_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  RAG_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  RAG_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RAG_MAX_CONSECUTIVE_STORE_FAILURES: z.coerce.number().int().min(1).default(3),
  RAG_MAX_CHUNKS: z.coerce.number().int().min(1).default(5),
  RAG_SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.5),
  RAG_CONTEXT_MAX_LENGTH: z.coerce.number().int().min(1).default(3000),
  RAG_RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().min(1).default(2000),
  RAG_STALE_RUN_MINUTES: z.coerce.number().min(1).default(30),
  RAG_SCHEDULE_INTERVAL_MINUTES: z.coerce.number().min(1).default(60),
  RAG_FULL_REBUILD_INTERVAL_HOURS: z.coerce.number().min(1).default(168),
  RAG_WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  RAG_SOURCE_LOOKBACK_DAYS: z.coerce.number().int().min(1).default(90),
});

export interface AppConfig {
  databaseUrl?: string;
  port: number;
  openai: {
    apiKey?: string;
    baseURL?: string;
    embeddingsModel: string;
  };
  indexing: {
    batchSize: number;
    concurrency: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
    maxConsecutiveStoreFailures: number;
    staleRunMs: number;
    lookbackDays: number;
  };
  scheduler: {
    intervalMs: number;
    fullRebuildIntervalMs: number;
    workerConcurrency: number;
  };
  retrieval: {
    enabled: boolean;
    k: number;
    similarityFloor: number;
    maxContextChars: number;
    timeoutMs: number;
  };
}

const MINUTE_MS = 60_000;

/**
 * Parse configuration from an environment map. Blank values count as unset.
 * @throws Error listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    port: e.PORT,
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.OPENAI_BASE_URL,
      embeddingsModel: e.OPENAI_EMBEDDINGS_MODEL,
    },
    indexing: {
      batchSize: e.RAG_EMBEDDING_BATCH_SIZE,
      concurrency: e.RAG_EMBEDDING_CONCURRENCY,
      maxAttempts: e.RAG_MAX_ATTEMPTS,
      retryBaseDelayMs: e.RAG_RETRY_BASE_DELAY_MS,
      maxConsecutiveStoreFailures: e.RAG_MAX_CONSECUTIVE_STORE_FAILURES,
      staleRunMs: e.RAG_STALE_RUN_MINUTES * MINUTE_MS,
      lookbackDays: e.RAG_SOURCE_LOOKBACK_DAYS,
    },
    scheduler: {
      intervalMs: e.RAG_SCHEDULE_INTERVAL_MINUTES * MINUTE_MS,
      fullRebuildIntervalMs: e.RAG_FULL_REBUILD_INTERVAL_HOURS * 60 * MINUTE_MS,
      workerConcurrency: e.RAG_WORKER_CONCURRENCY,
    },
    retrieval: {
      enabled: e.RAG_ENABLED,
      k: e.RAG_MAX_CHUNKS,
      similarityFloor: e.RAG_SIMILARITY_THRESHOLD,
      maxContextChars: e.RAG_CONTEXT_MAX_LENGTH,
      timeoutMs: e.RAG_RETRIEVAL_TIMEOUT_MS,
    },
  };
}
