// ABOUTME: In-process VectorStore with exact cosine scans, partitioned by tenant.
// ABOUTME: Stand-in for the pgvector store in tests and single-process development.
import type { VectorQueryOptions, VectorStore } from './index.js';
import {
  sourceKeyOf,
  type ChunkInput,
  type ChunkRecord,
  type ScoredChunk,
  type SourceKey,
  type StoredChunkState,
} from '../types.js';

interface StoredChunk {
  record: ChunkRecord;
  embedding: number[] | null;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryVectorStore implements VectorStore {
  private tenants = new Map<number, Map<string, StoredChunk>>();
  private nextId = 1;
  private now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async upsert(tenantId: number, chunk: ChunkInput, embedding: number[]): Promise<ChunkRecord> {
    const stored = this.write(tenantId, chunk, [...embedding]);
    return { ...stored.record };
  }

  async markPending(tenantId: number, chunk: ChunkInput): Promise<void> {
    this.write(tenantId, chunk, null);
  }

  async touch(tenantId: number, keys: SourceKey[]): Promise<void> {
    const chunks = this.tenants.get(tenantId);
    if (!chunks) return;

    const at = this.now();
    for (const key of keys) {
      const stored = chunks.get(sourceKeyOf(key));
      if (stored) stored.record.updatedAt = at;
    }
  }

  async delete(tenantId: number, sourceTable: string, sourceId: number): Promise<boolean> {
    return this.tenants.get(tenantId)?.delete(sourceKeyOf({ sourceTable, sourceId })) ?? false;
  }

  async query(tenantId: number, vector: number[], options: VectorQueryOptions): Promise<ScoredChunk[]> {
    const chunks = this.tenants.get(tenantId);
    if (!chunks || options.k <= 0) return [];

    const types = options.chunkTypes && options.chunkTypes.length > 0 ? new Set(options.chunkTypes) : null;
    const scored: ScoredChunk[] = [];

    for (const { record, embedding } of chunks.values()) {
      if (!embedding) continue;
      if (types && !types.has(record.chunkType)) continue;

      const score = cosineSimilarity(vector, embedding);
      if (score >= options.similarityFloor) {
        scored.push({ chunk: { ...record }, score });
      }
    }

    scored.sort((a, b) => b.score - a.score || a.chunk.id - b.chunk.id);
    return scored.slice(0, options.k);
  }

  async getChunkStates(tenantId: number, keys: SourceKey[]): Promise<Map<string, StoredChunkState>> {
    const chunks = this.tenants.get(tenantId);
    const states = new Map<string, StoredChunkState>();
    if (!chunks) return states;

    for (const key of keys) {
      const id = sourceKeyOf(key);
      const stored = chunks.get(id);
      if (stored) {
        states.set(id, { chunkHash: stored.record.chunkHash, hasEmbedding: stored.embedding !== null });
      }
    }
    return states;
  }

  async listSourceKeys(tenantId: number): Promise<SourceKey[]> {
    return [...(this.tenants.get(tenantId)?.values() ?? [])].map(({ record }) => ({
      sourceTable: record.sourceTable,
      sourceId: record.sourceId,
    }));
  }

  async listPendingKeys(tenantId: number): Promise<SourceKey[]> {
    return [...(this.tenants.get(tenantId)?.values() ?? [])]
      .filter((stored) => stored.embedding === null)
      .map(({ record }) => ({ sourceTable: record.sourceTable, sourceId: record.sourceId }));
  }

  async count(tenantId: number): Promise<number> {
    return this.tenants.get(tenantId)?.size ?? 0;
  }

  private write(tenantId: number, chunk: ChunkInput, embedding: number[] | null): StoredChunk {
    let chunks = this.tenants.get(tenantId);
    if (!chunks) {
      chunks = new Map();
      this.tenants.set(tenantId, chunks);
    }

    const at = this.now();
    const id = sourceKeyOf(chunk);
    const existing = chunks.get(id);

    const stored: StoredChunk = {
      record: {
        id: existing?.record.id ?? this.nextId++,
        tenantId,
        sourceTable: chunk.sourceTable,
        sourceId: chunk.sourceId,
        chunkType: chunk.chunkType,
        chunkText: chunk.chunkText,
        chunkHash: chunk.chunkHash,
        createdAt: existing?.record.createdAt ?? at,
        updatedAt: at,
      },
      embedding,
    };
    chunks.set(id, stored);
    return stored;
  }
}
