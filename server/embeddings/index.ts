// ABOUTME: Embedding client contract used by the indexer and the query-time retriever.
// ABOUTME: Batched calls report one outcome per input so a single bad item never fails a batch.
import { EMBEDDING_DIMENSIONS } from '../../db/schema.js';
import type { EmbeddingError } from '../rag/errors.js';
import type { AppConfig } from '../config.js';
import { createOpenAIEmbeddingClient } from './openai-embeddings.js';

export type EmbedOutcome =
  | { ok: true; embedding: number[] }
  | { ok: false; error: EmbeddingError };

export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface EmbeddingClient {
  readonly dimensions: number;
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
  embedBatch(texts: string[], options?: EmbedOptions): Promise<EmbedOutcome[]>;
  /** Whether a failed call is worth another attempt. */
  isRetryable(error: unknown): boolean;
}

/**
 * Build the configured embedding client. Only the OpenAI provider is
 * supported; its vector width must match the pgvector column.
 */
export function createEmbeddingClient(config: AppConfig): EmbeddingClient {
  if (!config.openai.apiKey) {
    throw new Error('OPENAI_API_KEY is not configured');
  }

  return createOpenAIEmbeddingClient({
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseURL,
    model: config.openai.embeddingsModel,
    dimensions: EMBEDDING_DIMENSIONS,
  });
}

/**
 * Log which embedding provider is active on server startup.
 */
export function initEmbeddingServices(config: AppConfig): void {
  console.log('Initializing embedding services...');

  if (config.openai.apiKey) {
    console.log(`✓ OpenAI embeddings configured (${config.openai.embeddingsModel}, ${EMBEDDING_DIMENSIONS} dims)`);
  } else {
    console.warn('⚠ OpenAI embeddings not configured (OPENAI_API_KEY not set)');
  }
}
