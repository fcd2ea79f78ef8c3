// ABOUTME: Tenant-scoped vector store contract for chunk records and their embeddings.
// ABOUTME: Every operation takes tenantId first; no implementation may read or write across tenants.
import type { ChunkInput, ChunkRecord, ChunkType, ScoredChunk, SourceKey, StoredChunkState } from '../types.js';

export interface VectorQueryOptions {
  k: number;
  /** Minimum cosine similarity a result must reach. */
  similarityFloor: number;
  chunkTypes?: ChunkType[];
}

export interface VectorStore {
  /** Write chunk record and vector in one atomic step. */
  upsert(tenantId: number, chunk: ChunkInput, embedding: number[]): Promise<ChunkRecord>;

  /**
   * Write the chunk record without a vector, dropping any vector that was
   * generated for an older hash. The chunk stays pending until its next run.
   */
  markPending(tenantId: number, chunk: ChunkInput): Promise<void>;

  /** Refresh bookkeeping timestamps of unchanged chunks. */
  touch(tenantId: number, keys: SourceKey[]): Promise<void>;

  /** Remove a chunk record; its vector goes with it. */
  delete(tenantId: number, sourceTable: string, sourceId: number): Promise<boolean>;

  /**
   * Nearest chunks by cosine similarity, best first, ties by ascending
   * chunk id. Only chunks with a vector are candidates.
   */
  query(tenantId: number, vector: number[], options: VectorQueryOptions): Promise<ScoredChunk[]>;

  /** Stored hash and vector presence, keyed by sourceKeyOf(). */
  getChunkStates(tenantId: number, keys: SourceKey[]): Promise<Map<string, StoredChunkState>>;

  listSourceKeys(tenantId: number): Promise<SourceKey[]>;

  /** Chunks whose record exists but whose vector does not. */
  listPendingKeys(tenantId: number): Promise<SourceKey[]>;

  count(tenantId: number): Promise<number>;
}
