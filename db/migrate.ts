// ABOUTME: Migration runner script that applies SQL migrations to the database.
// ABOUTME: Enables pgvector first, then executes drizzle-kit migration files in order.
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { closeDb, getDb, getSql } from './client.js';

async function runMigrations() {
  console.log('Running migrations...');

  try {
    await getSql()`CREATE EXTENSION IF NOT EXISTS vector`;
    await migrate(getDb(), { migrationsFolder: './db/migrations' });
    console.log('Migrations completed successfully');
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await closeDb();
  }
}

void runMigrations();
