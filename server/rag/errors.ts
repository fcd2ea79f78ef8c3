// ABOUTME: Error taxonomy for indexing and retrieval failures.
// ABOUTME: Each error carries a stable code so logs, IndexStatus rows and API responses can report it.

export type RagErrorCode =
  | 'extraction_failed'
  | 'embedding_failed'
  | 'vector_store_failed'
  | 'retrieval_timeout'
  | 'run_superseded';

export class RagError extends Error {
  constructor(
    message: string,
    public readonly code: RagErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RagError';
  }
}

/**
 * Relational read failed; aborts the current run.
 */
export class ExtractionError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'extraction_failed', options);
    this.name = 'ExtractionError';
  }
}

export class EmbeddingError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'embedding_failed', options);
    this.name = 'EmbeddingError';
  }
}

/**
 * Upsert, delete or query against the vector store failed.
 * `connectivity` marks failures that should abort a whole indexing run.
 */
export class VectorStoreError extends RagError {
  constructor(
    message: string,
    public readonly connectivity = false,
    options?: { cause?: unknown },
  ) {
    super(message, 'vector_store_failed', options);
    this.name = 'VectorStoreError';
  }
}

export class RetrievalTimeout extends RagError {
  constructor(public readonly timeoutMs: number) {
    super(`Retrieval exceeded ${timeoutMs}ms`, 'retrieval_timeout');
    this.name = 'RetrievalTimeout';
  }
}

export class RunSupersededError extends RagError {
  constructor(tenantId: number) {
    super(`Indexing run for tenant ${tenantId} was superseded`, 'run_superseded');
    this.name = 'RunSupersededError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
