// ABOUTME: SourceReader over the business tables with Drizzle: orders, products, stocks, reviews, sales.
// ABOUTME: Product names are resolved by joining products on (tenant_id, nm_id) at extraction time.
import { and, asc, eq, gt, gte, inArray, or, type SQL } from 'drizzle-orm';
import type { Database } from '../../../db/client.js';
import { orders, products, reviews, sales, stocks } from '../../../db/source-schema.js';
import { ExtractionError, errorMessage } from '../errors.js';
import { SOURCE_TABLES, type SourceKey, type SourceRow } from '../types.js';
import type { SourceReader } from './index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

interface Filters {
  orders?: SQL;
  products?: SQL;
  stocks?: SQL;
  reviews?: SQL;
  sales?: SQL;
}

export interface DrizzleSourceReaderOptions {
  /** Orders, reviews and sales older than this are not indexed. */
  lookbackDays: number;
  now?: () => Date;
}

export class DrizzleSourceReader implements SourceReader {
  private lookbackDays: number;
  private now: () => Date;

  constructor(private db: Database, options: DrizzleSourceReaderOptions) {
    this.lookbackDays = options.lookbackDays;
    this.now = options.now ?? (() => new Date());
  }

  async listTenants(): Promise<number[]> {
    return this.extract('listTenants', async () => {
      const results = await Promise.all([
        this.db.selectDistinct({ tenantId: products.tenantId }).from(products),
        this.db.selectDistinct({ tenantId: orders.tenantId }).from(orders),
        this.db.selectDistinct({ tenantId: stocks.tenantId }).from(stocks),
        this.db.selectDistinct({ tenantId: reviews.tenantId }).from(reviews),
        this.db.selectDistinct({ tenantId: sales.tenantId }).from(sales),
      ]);

      const tenants = new Set<number>();
      for (const rows of results) {
        for (const row of rows) tenants.add(row.tenantId);
      }
      return [...tenants].sort((a, b) => a - b);
    });
  }

  async selectAll(tenantId: number): Promise<SourceRow[]> {
    return this.extract('selectAll', () => this.read(tenantId, {}));
  }

  async selectChanged(tenantId: number, since: Date): Promise<SourceRow[]> {
    const productChanged = gt(products.updatedAt, since);
    return this.extract('selectChanged', () =>
      this.read(tenantId, {
        orders: or(gt(orders.updatedAt, since), productChanged),
        products: productChanged,
        stocks: or(gt(stocks.updatedAt, since), productChanged),
        reviews: or(gt(reviews.updatedAt, since), productChanged),
        sales: or(gt(sales.updatedAt, since), productChanged),
      }),
    );
  }

  async selectByKeys(tenantId: number, keys: SourceKey[]): Promise<SourceRow[]> {
    if (keys.length === 0) return [];

    const ids = (table: string): number[] => keys.filter((key) => key.sourceTable === table).map((key) => key.sourceId);
    const orderIds = ids(SOURCE_TABLES.order);
    const productIds = ids(SOURCE_TABLES.product);
    const stockIds = ids(SOURCE_TABLES.stock);
    const reviewIds = ids(SOURCE_TABLES.review);
    const saleIds = ids(SOURCE_TABLES.sale);

    const filters: Filters = {
      orders: orderIds.length > 0 ? inArray(orders.id, orderIds) : undefined,
      products: productIds.length > 0 ? inArray(products.id, productIds) : undefined,
      stocks: stockIds.length > 0 ? inArray(stocks.id, stockIds) : undefined,
      reviews: reviewIds.length > 0 ? inArray(reviews.id, reviewIds) : undefined,
      sales: saleIds.length > 0 ? inArray(sales.id, saleIds) : undefined,
    };

    return this.extract('selectByKeys', () => this.read(tenantId, filters, true));
  }

  /**
   * Read every table with its base filters plus the per-table extra filter.
   * With `onlyFiltered`, a table without an extra filter is not read at all.
   */
  private async read(tenantId: number, filters: Filters, onlyFiltered = false): Promise<SourceRow[]> {
    const cutoff = new Date(this.now().getTime() - this.lookbackDays * DAY_MS);
    const wanted = (filter: SQL | undefined): boolean => !onlyFiltered || filter !== undefined;
    const rows: SourceRow[] = [];

    if (wanted(filters.orders)) {
      const result = await this.db
        .select({ order: orders, productName: products.name })
        .from(orders)
        .leftJoin(products, and(eq(products.tenantId, orders.tenantId), eq(products.nmId, orders.nmId)))
        .where(and(eq(orders.tenantId, tenantId), gte(orders.orderDate, cutoff), filters.orders))
        .orderBy(asc(orders.id));

      for (const { order, productName } of result) {
        rows.push({
          chunkType: 'order',
          sourceTable: SOURCE_TABLES.order,
          sourceId: order.id,
          updatedAt: order.updatedAt,
          orderNumber: order.orderNumber,
          nmId: order.nmId,
          productName: productName ?? order.name,
          size: order.size,
          price: order.price,
          orderDate: order.orderDate,
          status: order.status,
        });
      }
    }

    if (wanted(filters.products)) {
      const result = await this.db
        .select()
        .from(products)
        .where(and(eq(products.tenantId, tenantId), eq(products.isActive, true), filters.products))
        .orderBy(asc(products.id));

      for (const product of result) {
        rows.push({
          chunkType: 'product',
          sourceTable: SOURCE_TABLES.product,
          sourceId: product.id,
          updatedAt: product.updatedAt,
          nmId: product.nmId,
          name: product.name,
          brand: product.brand,
          category: product.category,
          price: product.price,
          rating: product.rating,
          reviewsCount: product.reviewsCount,
        });
      }
    }

    if (wanted(filters.stocks)) {
      const result = await this.db
        .select({ stock: stocks, productName: products.name })
        .from(stocks)
        .leftJoin(products, and(eq(products.tenantId, stocks.tenantId), eq(products.nmId, stocks.nmId)))
        .where(and(eq(stocks.tenantId, tenantId), filters.stocks))
        .orderBy(asc(stocks.id));

      for (const { stock, productName } of result) {
        rows.push({
          chunkType: 'stock',
          sourceTable: SOURCE_TABLES.stock,
          sourceId: stock.id,
          updatedAt: stock.updatedAt,
          nmId: stock.nmId,
          productName: productName ?? stock.name,
          size: stock.size,
          warehouseName: stock.warehouseName,
          quantity: stock.quantity,
        });
      }
    }

    if (wanted(filters.reviews)) {
      const result = await this.db
        .select({ review: reviews, productName: products.name })
        .from(reviews)
        .leftJoin(products, and(eq(products.tenantId, reviews.tenantId), eq(products.nmId, reviews.nmId)))
        .where(and(eq(reviews.tenantId, tenantId), gte(reviews.createdAt, cutoff), filters.reviews))
        .orderBy(asc(reviews.id));

      for (const { review, productName } of result) {
        rows.push({
          chunkType: 'review',
          sourceTable: SOURCE_TABLES.review,
          sourceId: review.id,
          updatedAt: review.updatedAt,
          nmId: review.nmId,
          productName,
          rating: review.rating,
          text: review.text,
          reviewedAt: review.createdAt,
        });
      }
    }

    if (wanted(filters.sales)) {
      const result = await this.db
        .select({ sale: sales, productName: products.name })
        .from(sales)
        .leftJoin(products, and(eq(products.tenantId, sales.tenantId), eq(products.nmId, sales.nmId)))
        .where(and(eq(sales.tenantId, tenantId), gte(sales.saleDate, cutoff), filters.sales))
        .orderBy(asc(sales.id));

      for (const { sale, productName } of result) {
        rows.push({
          chunkType: 'sale',
          sourceTable: SOURCE_TABLES.sale,
          sourceId: sale.id,
          updatedAt: sale.updatedAt,
          nmId: sale.nmId,
          productName: productName ?? sale.productName,
          saleType: sale.type,
          saleDate: sale.saleDate,
          amount: sale.amount,
        });
      }
    }

    return rows;
  }

  private async extract<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new ExtractionError(`Source ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
