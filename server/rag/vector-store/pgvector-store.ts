// ABOUTME: VectorStore backed by Postgres + pgvector through Drizzle ORM.
// ABOUTME: Queries use the HNSW cosine index on rag_embeddings and always filter on tenant_id.
import { and, asc, cosineDistance, count, eq, inArray, isNull, or, sql, type SQL } from 'drizzle-orm';
import type { Database } from '../../../db/client.js';
import { ragChunks, ragEmbeddings, type ChunkRow } from '../../../db/schema.js';
import { VectorStoreError, errorMessage } from '../errors.js';
import {
  sourceKeyOf,
  type ChunkInput,
  type ChunkRecord,
  type ScoredChunk,
  type SourceKey,
  type StoredChunkState,
} from '../types.js';
import type { VectorQueryOptions, VectorStore } from './index.js';

/** Upper bound on ids bound into one IN (...) list. */
const KEY_BATCH_SIZE = 1000;

const CONNECTIVITY_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  '57P01', // admin_shutdown
  '08006', // connection_failure
]);

function isConnectivityError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && CONNECTIVITY_CODES.has(error.code);
}

function storeError(operation: string, error: unknown): VectorStoreError {
  return new VectorStoreError(`Vector store ${operation} failed: ${errorMessage(error)}`, isConnectivityError(error), {
    cause: error,
  });
}

function toRecord(row: ChunkRow): ChunkRecord {
  return {
    id: row.id,
    tenantId: row.tenantId,
    sourceTable: row.sourceTable,
    sourceId: row.sourceId,
    chunkType: row.chunkType,
    chunkText: row.chunkText,
    chunkHash: row.chunkHash,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/** Group keys by source table, then split into IN-list sized batches. */
function keyConditions(keys: SourceKey[]): SQL[] {
  const byTable = new Map<string, number[]>();
  for (const key of keys) {
    const ids = byTable.get(key.sourceTable) ?? [];
    ids.push(key.sourceId);
    byTable.set(key.sourceTable, ids);
  }

  const conditions: SQL[] = [];
  for (const [table, ids] of byTable) {
    for (let i = 0; i < ids.length; i += KEY_BATCH_SIZE) {
      const condition = and(eq(ragChunks.sourceTable, table), inArray(ragChunks.sourceId, ids.slice(i, i + KEY_BATCH_SIZE)));
      if (condition) conditions.push(condition);
    }
  }
  return conditions;
}

export class PgVectorStore implements VectorStore {
  constructor(private db: Database) {}

  async upsert(tenantId: number, chunk: ChunkInput, embedding: number[]): Promise<ChunkRecord> {
    try {
      return await this.db.transaction(async (tx) => {
        const row = await this.writeChunk(tx, tenantId, chunk);
        const now = new Date();

        await tx
          .insert(ragEmbeddings)
          .values({ chunkId: row.id, tenantId, embedding, chunkHash: chunk.chunkHash })
          .onConflictDoUpdate({
            target: [ragEmbeddings.chunkId, ragEmbeddings.tenantId],
            set: { embedding, chunkHash: chunk.chunkHash, updatedAt: now },
          });

        return toRecord(row);
      });
    } catch (error) {
      throw storeError('upsert', error);
    }
  }

  async markPending(tenantId: number, chunk: ChunkInput): Promise<void> {
    try {
      await this.db.transaction(async (tx) => {
        const row = await this.writeChunk(tx, tenantId, chunk);
        await tx
          .delete(ragEmbeddings)
          .where(and(eq(ragEmbeddings.tenantId, tenantId), eq(ragEmbeddings.chunkId, row.id)));
      });
    } catch (error) {
      throw storeError('markPending', error);
    }
  }

  async touch(tenantId: number, keys: SourceKey[]): Promise<void> {
    if (keys.length === 0) return;

    try {
      const now = new Date();
      for (const condition of keyConditions(keys)) {
        await this.db
          .update(ragChunks)
          .set({ updatedAt: now })
          .where(and(eq(ragChunks.tenantId, tenantId), condition));
      }
    } catch (error) {
      throw storeError('touch', error);
    }
  }

  async delete(tenantId: number, sourceTable: string, sourceId: number): Promise<boolean> {
    try {
      // rag_embeddings rows go with it through ON DELETE CASCADE
      const deleted = await this.db
        .delete(ragChunks)
        .where(
          and(
            eq(ragChunks.tenantId, tenantId),
            eq(ragChunks.sourceTable, sourceTable),
            eq(ragChunks.sourceId, sourceId),
          ),
        )
        .returning({ id: ragChunks.id });
      return deleted.length > 0;
    } catch (error) {
      throw storeError('delete', error);
    }
  }

  async query(tenantId: number, vector: number[], options: VectorQueryOptions): Promise<ScoredChunk[]> {
    if (options.k <= 0) return [];

    const distance = sql<number>`${cosineDistance(ragEmbeddings.embedding, vector)}`;
    const types = options.chunkTypes && options.chunkTypes.length > 0 ? options.chunkTypes : null;

    try {
      const rows = await this.db
        .select({ chunk: ragChunks, distance })
        .from(ragEmbeddings)
        .innerJoin(
          ragChunks,
          and(eq(ragChunks.id, ragEmbeddings.chunkId), eq(ragChunks.tenantId, ragEmbeddings.tenantId)),
        )
        .where(and(eq(ragEmbeddings.tenantId, tenantId), types ? inArray(ragChunks.chunkType, types) : undefined))
        .orderBy(distance, asc(ragChunks.id))
        .limit(options.k);

      // Top-k then floor equals floor then top-k: similarity is monotone in distance
      return rows
        .map((row) => ({ chunk: toRecord(row.chunk), score: 1 - Number(row.distance) }))
        .filter((result) => result.score >= options.similarityFloor);
    } catch (error) {
      throw storeError('query', error);
    }
  }

  async getChunkStates(tenantId: number, keys: SourceKey[]): Promise<Map<string, StoredChunkState>> {
    const states = new Map<string, StoredChunkState>();
    if (keys.length === 0) return states;

    try {
      for (const condition of keyConditions(keys)) {
        const rows = await this.db
          .select({
            sourceTable: ragChunks.sourceTable,
            sourceId: ragChunks.sourceId,
            chunkHash: ragChunks.chunkHash,
            embeddedHash: ragEmbeddings.chunkHash,
          })
          .from(ragChunks)
          .leftJoin(
            ragEmbeddings,
            and(eq(ragEmbeddings.chunkId, ragChunks.id), eq(ragEmbeddings.tenantId, ragChunks.tenantId)),
          )
          .where(and(eq(ragChunks.tenantId, tenantId), condition));

        for (const row of rows) {
          states.set(sourceKeyOf(row), {
            chunkHash: row.chunkHash,
            hasEmbedding: row.embeddedHash === row.chunkHash,
          });
        }
      }
      return states;
    } catch (error) {
      throw storeError('getChunkStates', error);
    }
  }

  async listSourceKeys(tenantId: number): Promise<SourceKey[]> {
    try {
      return await this.db
        .select({ sourceTable: ragChunks.sourceTable, sourceId: ragChunks.sourceId })
        .from(ragChunks)
        .where(eq(ragChunks.tenantId, tenantId));
    } catch (error) {
      throw storeError('listSourceKeys', error);
    }
  }

  async listPendingKeys(tenantId: number): Promise<SourceKey[]> {
    try {
      return await this.db
        .select({ sourceTable: ragChunks.sourceTable, sourceId: ragChunks.sourceId })
        .from(ragChunks)
        .leftJoin(
          ragEmbeddings,
          and(eq(ragEmbeddings.chunkId, ragChunks.id), eq(ragEmbeddings.tenantId, ragChunks.tenantId)),
        )
        .where(and(eq(ragChunks.tenantId, tenantId), or(isNull(ragEmbeddings.chunkId), sql`${ragEmbeddings.chunkHash} <> ${ragChunks.chunkHash}`)));
    } catch (error) {
      throw storeError('listPendingKeys', error);
    }
  }

  async count(tenantId: number): Promise<number> {
    try {
      const [row] = await this.db.select({ value: count() }).from(ragChunks).where(eq(ragChunks.tenantId, tenantId));
      return row?.value ?? 0;
    } catch (error) {
      throw storeError('count', error);
    }
  }

  private async writeChunk(
    tx: Parameters<Parameters<Database['transaction']>[0]>[0],
    tenantId: number,
    chunk: ChunkInput,
  ): Promise<ChunkRow> {
    const [row] = await tx
      .insert(ragChunks)
      .values({
        tenantId,
        sourceTable: chunk.sourceTable,
        sourceId: chunk.sourceId,
        chunkType: chunk.chunkType,
        chunkText: chunk.chunkText,
        chunkHash: chunk.chunkHash,
      })
      .onConflictDoUpdate({
        target: [ragChunks.tenantId, ragChunks.sourceTable, ragChunks.sourceId],
        set: {
          chunkType: chunk.chunkType,
          chunkText: chunk.chunkText,
          chunkHash: chunk.chunkHash,
          updatedAt: new Date(),
        },
      })
      .returning();

    if (!row) {
      throw new Error(`Upsert of ${sourceKeyOf(chunk)} returned no row`);
    }
    return row;
  }
}
