// ABOUTME: Drizzle Kit configuration for database migrations and schema management.
// ABOUTME: Generates migrations for the RAG tables and the local-development source tables.
import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';

const url = process.env.DATABASE_URL;

if (!url) {
  throw new Error('DATABASE_URL environment variable is not set');
}

export default defineConfig({
  schema: ['./db/schema.ts', './db/source-schema.ts'],
  out: './db/migrations',
  dialect: 'postgresql',
  dbCredentials: {
    url,
  },
});
