// ABOUTME: Query-time retriever: embeds the live query and runs a tenant-scoped similarity search.
// ABOUTME: Returns an explicit result instead of throwing; a hard timeout aborts the embedding request.
import type { EmbeddingClient } from '../embeddings/index.js';
import { throwIfAborted, withTimeout } from './async.js';
import { RetrievalTimeout, errorMessage } from './errors.js';
import type { ChunkType, ScoredChunk } from './types.js';
import type { VectorStore } from './vector-store/index.js';

export type RetrievalFailureReason = 'empty_query' | 'timeout' | 'embedding_failed' | 'store_failed' | 'no_results';

export type RetrievalResult =
  | { ok: true; chunks: ScoredChunk[] }
  | { ok: false; reason: RetrievalFailureReason; error?: Error };

export interface RetrieverOptions {
  embeddings: EmbeddingClient;
  store: VectorStore;
  k: number;
  similarityFloor: number;
  timeoutMs: number;
}

class QueryStageError extends Error {
  constructor(
    readonly reason: 'embedding_failed' | 'store_failed',
    readonly original: unknown,
  ) {
    super(errorMessage(original), { cause: original });
    this.name = 'QueryStageError';
  }
}

export class Retriever {
  constructor(private options: RetrieverOptions) {}

  async retrieve(tenantId: number, query: string, options: { chunkTypes?: ChunkType[] } = {}): Promise<RetrievalResult> {
    const text = query.trim();
    if (text.length === 0) {
      return { ok: false, reason: 'empty_query' };
    }

    const { embeddings, store, k, similarityFloor, timeoutMs } = this.options;

    try {
      const chunks = await withTimeout(
        async (signal) => {
          let vector: number[];
          try {
            vector = await embeddings.embed(text, { signal });
          } catch (error) {
            throw new QueryStageError('embedding_failed', error);
          }

          throwIfAborted(signal);
          try {
            return await store.query(tenantId, vector, { k, similarityFloor, chunkTypes: options.chunkTypes });
          } catch (error) {
            throw new QueryStageError('store_failed', error);
          }
        },
        timeoutMs,
        () => new RetrievalTimeout(timeoutMs),
      );

      return chunks.length > 0 ? { ok: true, chunks } : { ok: false, reason: 'no_results' };
    } catch (error) {
      if (error instanceof RetrievalTimeout) {
        return { ok: false, reason: 'timeout', error };
      }
      if (error instanceof QueryStageError) {
        const original = error.original instanceof Error ? error.original : error;
        return { ok: false, reason: error.reason, error: original };
      }
      return { ok: false, reason: 'embedding_failed', error: error instanceof Error ? error : new Error(String(error)) };
    }
  }
}
