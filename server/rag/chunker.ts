// ABOUTME: Renders one source business row into deterministic, normalized chunk text.
// ABOUTME: One ChunkRenderer per chunk type; callers only ever see renderChunk(row).
import type { OrderRow, ProductRow, ReviewRow, SaleRow, SourceRow, StockRow } from './types.js';

export interface ChunkRenderer<R extends SourceRow> {
  readonly chunkType: R['chunkType'];
  render(row: R): string;
}

const MISSING = 'N/A';
const REVIEW_TEXT_LIMIT = 200;

/** Trim and collapse internal whitespace; empty becomes the fallback. */
function clean(value: string | null | undefined, fallback = MISSING): string {
  const normalized = (value ?? '').replace(/\s+/g, ' ').trim();
  return normalized.length > 0 ? normalized : fallback;
}

function money(value: number | null): string {
  return value === null || !Number.isFinite(value) ? MISSING : value.toFixed(2);
}

function day(value: Date | null): string {
  if (!value || Number.isNaN(value.getTime())) return MISSING;
  return value.toISOString().slice(0, 10);
}

function id(value: number | null): string {
  return value === null ? MISSING : String(value);
}

function stockStatus(quantity: number): string[] {
  if (quantity <= 0) return ['out of stock', 'sold out', 'restock urgently'];
  if (quantity <= 5) return ['critical stock', 'very low', 'restock urgently'];
  if (quantity <= 10) return ['low stock', 'running low', 'needs restocking'];
  if (quantity <= 20) return ['moderate stock', 'consider restocking'];
  return ['sufficient stock', 'stock is healthy'];
}

export const orderRenderer: ChunkRenderer<OrderRow> = {
  chunkType: 'order',
  render(row) {
    return (
      `Order #${clean(row.orderNumber, String(row.sourceId))} from ${day(row.orderDate)}: ` +
      `product '${clean(row.productName, 'Unknown product')}' (nm_id: ${id(row.nmId)}), ` +
      `size ${clean(row.size)}, price ${money(row.price)}, status: ${clean(row.status)}`
    );
  },
};

export const productRenderer: ChunkRenderer<ProductRow> = {
  chunkType: 'product',
  render(row) {
    const rating = row.rating === null || !Number.isFinite(row.rating) ? MISSING : row.rating.toFixed(1);
    return (
      `Product '${clean(row.name, 'Unknown product')}' article nm_id ${row.nmId}. ` +
      `Brand: ${clean(row.brand, 'Unknown brand')}. ` +
      `Category: ${clean(row.category, 'Uncategorized')}. ` +
      `Rating: ${rating} of 5. ` +
      `Reviews: ${row.reviewsCount ?? 0}. ` +
      `Price: ${money(row.price)}.`
    );
  },
};

export const stockRenderer: ChunkRenderer<StockRow> = {
  chunkType: 'stock',
  render(row) {
    const quantity = Math.max(0, Math.trunc(row.quantity ?? 0));
    return (
      `Stock of product '${clean(row.productName, 'Unknown product')}' nm_id ${id(row.nmId)}: ` +
      `size ${clean(row.size)}, warehouse ${clean(row.warehouseName, 'Unknown warehouse')}, ` +
      `quantity ${quantity} units. Status: ${stockStatus(quantity).join(', ')}.`
    );
  },
};

export const reviewRenderer: ChunkRenderer<ReviewRow> = {
  chunkType: 'review',
  render(row) {
    let text = clean(row.text, 'No text');
    // Cut on code points so a surrogate pair is never split
    const chars = Array.from(text);
    if (chars.length > REVIEW_TEXT_LIMIT) {
      text = `${chars.slice(0, REVIEW_TEXT_LIMIT).join('')}...`;
    }
    const rating = row.rating === null || !Number.isFinite(row.rating) ? MISSING : String(Math.trunc(row.rating));
    return (
      `Review of product '${clean(row.productName, 'Unknown product')}' (nm_id: ${id(row.nmId)}): ` +
      `rating ${rating}/5, date: ${day(row.reviewedAt)}, text: '${text}'`
    );
  },
};

export const saleRenderer: ChunkRenderer<SaleRow> = {
  chunkType: 'sale',
  render(row) {
    const type = clean(row.saleType);
    const label = type === 'buyout' ? 'BUYOUT' : type === 'return' ? 'RETURN' : type.toUpperCase();
    return (
      `${label} on ${day(row.saleDate)}: product '${clean(row.productName, 'Unknown product')}' ` +
      `(nm_id: ${id(row.nmId)}), amount: ${money(row.amount)}`
    );
  },
};

/**
 * Render a source row to chunk text. Pure: the same row state always
 * yields byte-identical output.
 */
export function renderChunk(row: SourceRow): string {
  switch (row.chunkType) {
    case 'order':
      return orderRenderer.render(row);
    case 'product':
      return productRenderer.render(row);
    case 'stock':
      return stockRenderer.render(row);
    case 'review':
      return reviewRenderer.render(row);
    case 'sale':
      return saleRenderer.render(row);
    default:
      return assertNever(row);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unsupported source row: ${JSON.stringify(value)}`);
}
