// ABOUTME: Database client configuration using Drizzle ORM with postgres.js driver.
// ABOUTME: Connects lazily using DATABASE_URL so modules that only need types never open a connection.
import 'dotenv/config';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';

export type Database = PostgresJsDatabase;

let sqlClient: postgres.Sql | null = null;
let database: Database | null = null;

/**
 * Shared postgres.js connection, created on first use.
 */
export function getSql(connectionString = process.env.DATABASE_URL): postgres.Sql {
  if (sqlClient) return sqlClient;

  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set');
  }

  sqlClient = postgres(connectionString);
  return sqlClient;
}

export function getDb(connectionString?: string): Database {
  if (database) return database;
  database = drizzle(getSql(connectionString));
  return database;
}

export async function closeDb(): Promise<void> {
  if (!sqlClient) return;
  await sqlClient.end();
  sqlClient = null;
  database = null;
}
