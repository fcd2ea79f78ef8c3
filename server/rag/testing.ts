// ABOUTME: In-process stand-ins for the relational source and the embedding provider.
// ABOUTME: Used by the test suites; deterministic so runs can be compared chunk for chunk.
import { EmbeddingError, ExtractionError } from './errors.js';
import type { EmbedOptions, EmbedOutcome, EmbeddingClient } from '../embeddings/index.js';
import type { SourceReader } from './source/index.js';
import {
  SOURCE_TABLES,
  sourceKeyOf,
  type OrderRow,
  type ProductRow,
  type ReviewRow,
  type SaleRow,
  type SourceKey,
  type SourceRow,
  type StockRow,
} from './types.js';
import { sleep, throwIfAborted } from './async.js';

export class InMemorySourceReader implements SourceReader {
  private tenants = new Map<number, Map<string, SourceRow>>();
  /** When set, the next read rejects with it. */
  failNextRead: Error | null = null;

  put(tenantId: number, ...rows: SourceRow[]): void {
    let table = this.tenants.get(tenantId);
    if (!table) {
      table = new Map();
      this.tenants.set(tenantId, table);
    }
    for (const row of rows) table.set(sourceKeyOf(row), row);
  }

  remove(tenantId: number, key: SourceKey): void {
    this.tenants.get(tenantId)?.delete(sourceKeyOf(key));
  }

  async listTenants(): Promise<number[]> {
    return [...this.tenants.keys()].sort((a, b) => a - b);
  }

  async selectAll(tenantId: number): Promise<SourceRow[]> {
    return this.rows(tenantId);
  }

  async selectChanged(tenantId: number, since: Date): Promise<SourceRow[]> {
    return this.rows(tenantId).filter((row) => row.updatedAt.getTime() > since.getTime());
  }

  async selectByKeys(tenantId: number, keys: SourceKey[]): Promise<SourceRow[]> {
    const wanted = new Set(keys.map(sourceKeyOf));
    return this.rows(tenantId).filter((row) => wanted.has(sourceKeyOf(row)));
  }

  private rows(tenantId: number): SourceRow[] {
    if (this.failNextRead) {
      const error = this.failNextRead;
      this.failNextRead = null;
      throw new ExtractionError(error.message, { cause: error });
    }
    return [...(this.tenants.get(tenantId)?.values() ?? [])];
  }
}

/**
 * Hashed bag-of-words vector, L2 normalised. Texts sharing words land close
 * together, which is all retrieval tests need.
 */
export function bagOfWords(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const word of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
    let hash = 2166136261;
    for (let i = 0; i < word.length; i++) {
      hash ^= word.charCodeAt(i);
      hash = Math.imul(hash, 16777619);
    }
    vector[(hash >>> 0) % dimensions] += 1;
  }

  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  return norm === 0 ? vector : vector.map((value) => value / norm);
}

export interface FakeEmbeddingClientOptions {
  dimensions?: number;
  vectorFor?: (text: string) => number[];
  /** Called before every embedding; returning an error fails that item. */
  failWith?: (text: string, attempt: number) => Error | null;
  /** Delay applied to each call; honours the abort signal. */
  delayMs?: number;
  retryable?: boolean;
}

export class FakeEmbeddingClient implements EmbeddingClient {
  readonly dimensions: number;
  /** Every text embedded successfully, in order. */
  readonly embedded: string[] = [];
  batchCalls = 0;
  private attempts = new Map<string, number>();
  private options: FakeEmbeddingClientOptions;

  constructor(options: FakeEmbeddingClientOptions = {}) {
    this.options = options;
    this.dimensions = options.dimensions ?? 64;
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    await this.wait(options.signal);

    const attempt = (this.attempts.get(text) ?? 0) + 1;
    this.attempts.set(text, attempt);

    const failure = this.options.failWith?.(text, attempt);
    if (failure) {
      throw new EmbeddingError(failure.message, { cause: failure });
    }

    this.embedded.push(text);
    return this.options.vectorFor ? this.options.vectorFor(text) : bagOfWords(text, this.dimensions);
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<EmbedOutcome[]> {
    this.batchCalls++;
    const outcomes: EmbedOutcome[] = [];
    for (const text of texts) {
      try {
        outcomes.push({ ok: true, embedding: await this.embed(text, options) });
      } catch (error) {
        if (options.signal?.aborted || !(error instanceof EmbeddingError)) throw error;
        outcomes.push({ ok: false, error });
      }
    }
    return outcomes;
  }

  isRetryable(): boolean {
    return this.options.retryable ?? true;
  }

  private async wait(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    const delay = this.options.delayMs ?? 0;
    if (delay > 0) await sleep(delay, signal);
  }
}

type RowFields<R extends SourceRow> = Partial<Omit<R, 'chunkType' | 'sourceTable' | 'sourceId'>>;

const FIXTURE_TIME = new Date('2024-05-01T00:00:00.000Z');

export function orderRow(sourceId: number, fields: RowFields<OrderRow> = {}): OrderRow {
  return {
    chunkType: 'order',
    sourceTable: SOURCE_TABLES.order,
    sourceId,
    updatedAt: FIXTURE_TIME,
    orderNumber: `A-${sourceId}`,
    nmId: 1000 + sourceId,
    productName: 'Linen dress',
    size: 'M',
    price: 100,
    orderDate: new Date('2024-05-01T10:00:00.000Z'),
    status: 'delivered',
    ...fields,
  };
}

export function productRow(sourceId: number, fields: RowFields<ProductRow> = {}): ProductRow {
  return {
    chunkType: 'product',
    sourceTable: SOURCE_TABLES.product,
    sourceId,
    updatedAt: FIXTURE_TIME,
    nmId: 1000 + sourceId,
    name: 'Linen dress',
    brand: 'Nordwind',
    category: 'Dresses',
    price: 100,
    rating: 4.5,
    reviewsCount: 10,
    ...fields,
  };
}

export function stockRow(sourceId: number, fields: RowFields<StockRow> = {}): StockRow {
  return {
    chunkType: 'stock',
    sourceTable: SOURCE_TABLES.stock,
    sourceId,
    updatedAt: FIXTURE_TIME,
    nmId: 1000 + sourceId,
    productName: 'Linen dress',
    size: 'M',
    warehouseName: 'Central',
    quantity: 50,
    ...fields,
  };
}

export function reviewRow(sourceId: number, fields: RowFields<ReviewRow> = {}): ReviewRow {
  return {
    chunkType: 'review',
    sourceTable: SOURCE_TABLES.review,
    sourceId,
    updatedAt: FIXTURE_TIME,
    nmId: 1000 + sourceId,
    productName: 'Linen dress',
    rating: 5,
    text: 'Fits well',
    reviewedAt: new Date('2024-05-02T12:00:00.000Z'),
    ...fields,
  };
}

export function saleRow(sourceId: number, fields: RowFields<SaleRow> = {}): SaleRow {
  return {
    chunkType: 'sale',
    sourceTable: SOURCE_TABLES.sale,
    sourceId,
    updatedAt: FIXTURE_TIME,
    nmId: 1000 + sourceId,
    productName: 'Linen dress',
    saleType: 'buyout',
    saleDate: new Date('2024-05-03T08:00:00.000Z'),
    amount: 90,
    ...fields,
  };
}
