// ABOUTME: Drizzle ORM schema for the RAG index: chunk records, their pgvector embeddings and per-tenant index status.
// ABOUTME: Every table carries tenant_id so Citus can distribute and colocate them by tenant.
import {
  pgTable,
  bigserial,
  bigint,
  text,
  varchar,
  integer,
  vector,
  timestamp,
  primaryKey,
  foreignKey,
  uniqueIndex,
  index,
  jsonb,
} from 'drizzle-orm/pg-core';

/** Vector width of text-embedding-3-small. */
export const EMBEDDING_DIMENSIONS = 1536;

export const CHUNK_TYPES = ['order', 'product', 'stock', 'review', 'sale'] as const;
export type ChunkType = (typeof CHUNK_TYPES)[number];

export const INDEX_STATUSES = ['pending', 'indexing', 'indexed', 'failed'] as const;
export type IndexStatusValue = (typeof INDEX_STATUSES)[number];

export const ragChunks = pgTable('rag_chunks', {
  id: bigserial('id', { mode: 'number' }).notNull(),
  tenantId: bigint('tenant_id', { mode: 'number' }).notNull(),
  sourceTable: varchar('source_table', { length: 50 }).notNull(),
  sourceId: bigint('source_id', { mode: 'number' }).notNull(),
  chunkType: text('chunk_type', { enum: CHUNK_TYPES }).notNull(),
  chunkText: text('chunk_text').notNull(),
  chunkHash: varchar('chunk_hash', { length: 64 }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.id, table.tenantId] }),
  sourceUnique: uniqueIndex('uq_rag_chunks_tenant_source').on(table.tenantId, table.sourceTable, table.sourceId),
  tenantTypeIdx: index('idx_rag_chunks_tenant_type').on(table.tenantId, table.chunkType),
}));

export const ragEmbeddings = pgTable('rag_embeddings', {
  chunkId: bigint('chunk_id', { mode: 'number' }).notNull(),
  tenantId: bigint('tenant_id', { mode: 'number' }).notNull(),
  embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
  // Hash of the chunk text this vector was generated from
  chunkHash: varchar('chunk_hash', { length: 64 }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.chunkId, table.tenantId] }),
  chunkFk: foreignKey({
    columns: [table.chunkId, table.tenantId],
    foreignColumns: [ragChunks.id, ragChunks.tenantId],
    name: 'fk_rag_embeddings_chunk',
  }).onDelete('cascade'),
  // HNSW: m=16, ef_construction=64 (pgvector defaults)
  vectorIdx: index('idx_rag_embeddings_vector').using('hnsw', table.embedding.op('vector_cosine_ops')),
}));

export const ragIndexStatus = pgTable('rag_index_status', {
  tenantId: bigint('tenant_id', { mode: 'number' }).primaryKey(),
  status: text('status', { enum: INDEX_STATUSES }).default('pending').notNull(),
  lastFullIndexAt: timestamp('last_full_index_at', { withTimezone: true }),
  lastIncrementalIndexAt: timestamp('last_incremental_index_at', { withTimezone: true }),
  totalChunks: integer('total_chunks').default(0).notNull(),
  lastError: text('last_error'),
  lastErrorAt: timestamp('last_error_at', { withTimezone: true }),
  /** Token of the run that last claimed the row; only that run may finish it. */
  runId: text('run_id'),
  /** Rows whose store write failed; the next incremental run reads them by key. */
  retryKeys: jsonb('retry_keys').$type<Array<{ sourceTable: string; sourceId: number }>>().default([]).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export type ChunkRow = typeof ragChunks.$inferSelect;
export type NewChunkRow = typeof ragChunks.$inferInsert;
export type IndexStatusRow = typeof ragIndexStatus.$inferSelect;
