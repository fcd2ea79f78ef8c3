// ABOUTME: Builds the Postgres-backed RAG services from configuration.
// ABOUTME: Shared by the HTTP server and the operator CLI.
import { getDb } from '../db/client.js';
import type { AppConfig } from './config.js';
import { createEmbeddingClient } from './embeddings/index.js';
import { ContextBuilder } from './rag/context-builder.js';
import { RagIndexer } from './rag/indexer.js';
import { PromptEnricher } from './rag/prompt-enricher.js';
import { Retriever } from './rag/retriever.js';
import { DrizzleSourceReader } from './rag/source/drizzle-source.js';
import { PgStatusTracker } from './rag/status/pg-status-tracker.js';
import { PgVectorStore } from './rag/vector-store/pgvector-store.js';

export function createServices(config: AppConfig) {
  const db = getDb(config.databaseUrl);
  const embeddings = createEmbeddingClient(config);
  const store = new PgVectorStore(db);
  const status = new PgStatusTracker(db, { staleRunMs: config.indexing.staleRunMs });
  const source = new DrizzleSourceReader(db, { lookbackDays: config.indexing.lookbackDays });

  const indexer = new RagIndexer({
    source,
    store,
    embeddings,
    status,
    batchSize: config.indexing.batchSize,
    concurrency: config.indexing.concurrency,
    maxAttempts: config.indexing.maxAttempts,
    retryBaseDelayMs: config.indexing.retryBaseDelayMs,
    maxConsecutiveStoreFailures: config.indexing.maxConsecutiveStoreFailures,
  });

  const retriever = new Retriever({
    embeddings,
    store,
    k: config.retrieval.k,
    similarityFloor: config.retrieval.similarityFloor,
    timeoutMs: config.retrieval.timeoutMs,
  });

  const enricher = new PromptEnricher({
    retriever,
    contextBuilder: new ContextBuilder(config.retrieval.maxContextChars),
    enabled: config.retrieval.enabled,
  });

  return { store, status, source, indexer, retriever, enricher };
}

export type Services = ReturnType<typeof createServices>;
