// ABOUTME: Database seed script that populates the business tables with demo rows for two tenants.
// ABOUTME: Rows are deterministic so a first full index always yields the same chunks.
import 'dotenv/config';
import { inArray } from 'drizzle-orm';
import { closeDb, getDb } from './client.js';
import { orders, products, reviews, sales, stocks } from './source-schema.js';

const TENANTS = [1, 2];
const DAY_MS = 24 * 60 * 60 * 1000;

const catalogue = [
  { name: 'Linen summer dress', brand: 'Nordwind', category: 'Dresses', price: 2490 },
  { name: 'Merino wool sweater', brand: 'Nordwind', category: 'Knitwear', price: 3990 },
  { name: 'Cotton basic t-shirt', brand: 'Urbanline', category: 'T-shirts', price: 790 },
  { name: 'Slim fit jeans', brand: 'Urbanline', category: 'Jeans', price: 2990 },
  { name: 'Waterproof parka', brand: 'Polar Step', category: 'Outerwear', price: 8990 },
];

const sizes = ['S', 'M', 'L', 'XL'];
const warehouses = ['Central', 'North-West', 'South'];
const orderStatuses = ['new', 'shipped', 'delivered', 'cancelled'];
const reviewTexts = [
  'Great fit, fabric feels nice. Ordering another colour.',
  'Runs small, had to exchange for a bigger size.',
  'Colour is a little different from the photos but quality is fine.',
  'Arrived quickly, well packed.',
];

function daysAgo(days: number): Date {
  return new Date(Date.now() - days * DAY_MS);
}

async function seedDatabase() {
  console.log('Seeding business tables with demo data...');
  const db = getDb();

  try {
    await db.delete(orders).where(inArray(orders.tenantId, TENANTS));
    await db.delete(stocks).where(inArray(stocks.tenantId, TENANTS));
    await db.delete(reviews).where(inArray(reviews.tenantId, TENANTS));
    await db.delete(sales).where(inArray(sales.tenantId, TENANTS));
    await db.delete(products).where(inArray(products.tenantId, TENANTS));

    for (const tenantId of TENANTS) {
      const nmBase = tenantId * 100_000;

      await db.insert(products).values(
        catalogue.map((item, i) => ({
          tenantId,
          nmId: nmBase + i,
          ...item,
          rating: 4 + (i % 10) / 10,
          reviewsCount: 10 * (i + 1),
        }))
      );

      await db.insert(orders).values(
        Array.from({ length: 12 }, (_, i) => ({
          tenantId,
          orderNumber: `${tenantId}-${1000 + i}`,
          nmId: nmBase + (i % catalogue.length),
          name: catalogue[i % catalogue.length].name,
          size: sizes[i % sizes.length],
          price: catalogue[i % catalogue.length].price,
          orderDate: daysAgo(i * 3),
          status: orderStatuses[i % orderStatuses.length],
        }))
      );

      await db.insert(stocks).values(
        catalogue.flatMap((item, i) =>
          warehouses.map((warehouseName, w) => ({
            tenantId,
            nmId: nmBase + i,
            name: item.name,
            size: sizes[(i + w) % sizes.length],
            warehouseName,
            quantity: (i * 7 + w * 11) % 30,
          }))
        )
      );

      await db.insert(reviews).values(
        Array.from({ length: 8 }, (_, i) => ({
          tenantId,
          nmId: nmBase + (i % catalogue.length),
          rating: 5 - (i % 4),
          text: reviewTexts[i % reviewTexts.length],
          createdAt: daysAgo(i * 5),
        }))
      );

      await db.insert(sales).values(
        Array.from({ length: 10 }, (_, i) => ({
          tenantId,
          nmId: nmBase + (i % catalogue.length),
          productName: catalogue[i % catalogue.length].name,
          type: i % 5 === 4 ? 'return' : 'buyout',
          saleDate: daysAgo(i * 2),
          amount: catalogue[i % catalogue.length].price * 0.9,
        }))
      );

      console.log(`Tenant ${tenantId}: seeded ${catalogue.length} products, 12 orders, 15 stocks, 8 reviews, 10 sales`);
    }

    console.log('Seed completed successfully');
  } catch (error) {
    console.error('Seed failed:', error);
    process.exitCode = 1;
  } finally {
    await closeDb();
  }
}

void seedDatabase();
