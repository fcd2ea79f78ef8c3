// ABOUTME: Drizzle schema of the business tables the indexer reads (products, orders, stocks, reviews, sales).
// ABOUTME: The indexer never writes these; only db/seed.ts populates them for local development.
import { pgTable, bigserial, bigint, text, integer, doublePrecision, boolean, timestamp, index } from 'drizzle-orm/pg-core';

export const products = pgTable('products', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  tenantId: bigint('tenant_id', { mode: 'number' }).notNull(),
  nmId: bigint('nm_id', { mode: 'number' }).notNull(),
  name: text('name'),
  brand: text('brand'),
  category: text('category'),
  price: doublePrecision('price'),
  rating: doublePrecision('rating'),
  reviewsCount: integer('reviews_count'),
  isActive: boolean('is_active').default(true).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  tenantNmIdx: index('idx_products_tenant_nm').on(table.tenantId, table.nmId),
  tenantUpdatedIdx: index('idx_products_tenant_updated').on(table.tenantId, table.updatedAt),
}));

export const orders = pgTable('orders', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  tenantId: bigint('tenant_id', { mode: 'number' }).notNull(),
  orderNumber: text('order_number'),
  nmId: bigint('nm_id', { mode: 'number' }),
  name: text('name'),
  size: text('size'),
  price: doublePrecision('price'),
  orderDate: timestamp('order_date', { withTimezone: true }),
  status: text('status'),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  tenantUpdatedIdx: index('idx_orders_tenant_updated').on(table.tenantId, table.updatedAt),
}));

export const stocks = pgTable('stocks', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  tenantId: bigint('tenant_id', { mode: 'number' }).notNull(),
  nmId: bigint('nm_id', { mode: 'number' }),
  name: text('name'),
  size: text('size'),
  warehouseName: text('warehouse_name'),
  quantity: integer('quantity'),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  tenantUpdatedIdx: index('idx_stocks_tenant_updated').on(table.tenantId, table.updatedAt),
}));

export const reviews = pgTable('reviews', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  tenantId: bigint('tenant_id', { mode: 'number' }).notNull(),
  nmId: bigint('nm_id', { mode: 'number' }),
  rating: integer('rating'),
  text: text('text'),
  createdAt: timestamp('created_at', { withTimezone: true }),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  tenantUpdatedIdx: index('idx_reviews_tenant_updated').on(table.tenantId, table.updatedAt),
}));

export const sales = pgTable('sales', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  tenantId: bigint('tenant_id', { mode: 'number' }).notNull(),
  nmId: bigint('nm_id', { mode: 'number' }),
  productName: text('product_name'),
  type: text('type'),
  saleDate: timestamp('sale_date', { withTimezone: true }),
  amount: doublePrecision('amount'),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  tenantUpdatedIdx: index('idx_sales_tenant_updated').on(table.tenantId, table.updatedAt),
}));
