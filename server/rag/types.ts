// ABOUTME: Shared domain types for the RAG index: source rows, chunk records, scored results and index status.
// ABOUTME: Source rows form a tagged union on chunkType so each variant has exactly one renderer.
import type { ChunkType, IndexStatusValue } from '../../db/schema.js';

export type { ChunkType, IndexStatusValue };

/** Source table each chunk type is extracted from. */
export const SOURCE_TABLES = {
  order: 'orders',
  product: 'products',
  stock: 'stocks',
  review: 'reviews',
  sale: 'sales',
} as const satisfies Record<ChunkType, string>;

export type SourceTable = (typeof SOURCE_TABLES)[ChunkType];

export interface SourceKey {
  sourceTable: string;
  sourceId: number;
}

interface SourceRowBase extends SourceKey {
  updatedAt: Date;
}

export interface OrderRow extends SourceRowBase {
  chunkType: 'order';
  orderNumber: string | null;
  nmId: number | null;
  productName: string | null;
  size: string | null;
  price: number | null;
  orderDate: Date | null;
  status: string | null;
}

export interface ProductRow extends SourceRowBase {
  chunkType: 'product';
  nmId: number;
  name: string | null;
  brand: string | null;
  category: string | null;
  price: number | null;
  rating: number | null;
  reviewsCount: number | null;
}

export interface StockRow extends SourceRowBase {
  chunkType: 'stock';
  nmId: number | null;
  productName: string | null;
  size: string | null;
  warehouseName: string | null;
  quantity: number | null;
}

export interface ReviewRow extends SourceRowBase {
  chunkType: 'review';
  nmId: number | null;
  productName: string | null;
  rating: number | null;
  text: string | null;
  reviewedAt: Date | null;
}

export interface SaleRow extends SourceRowBase {
  chunkType: 'sale';
  nmId: number | null;
  productName: string | null;
  saleType: string | null;
  saleDate: Date | null;
  amount: number | null;
}

export type SourceRow = OrderRow | ProductRow | StockRow | ReviewRow | SaleRow;

/** Rendered chunk ready to be written to the vector store. */
export interface ChunkInput extends SourceKey {
  chunkType: ChunkType;
  chunkText: string;
  chunkHash: string;
}

export interface ChunkRecord extends ChunkInput {
  id: number;
  tenantId: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ScoredChunk {
  chunk: ChunkRecord;
  /** Cosine similarity in [-1, 1]. */
  score: number;
}

/** What the store knows about a chunk, used for change classification. */
export interface StoredChunkState {
  chunkHash: string;
  hasEmbedding: boolean;
}

export interface IndexStatus {
  tenantId: number;
  status: IndexStatusValue;
  lastFullIndexAt: Date | null;
  lastIncrementalIndexAt: Date | null;
  totalChunks: number;
  lastError: string | null;
  lastErrorAt: Date | null;
  runId: string | null;
  retryKeys: SourceKey[];
  createdAt: Date;
  updatedAt: Date;
}

export type IndexingMode = 'full' | 'incremental';

export function sourceKeyOf(key: SourceKey): string {
  return `${key.sourceTable}:${key.sourceId}`;
}
