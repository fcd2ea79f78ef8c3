// ABOUTME: Distributes the RAG tables by tenant_id on Citus and sets database-level pgvector settings.
// ABOUTME: Chunks, embeddings and index status are colocated so every tenant query stays on one shard.
import 'dotenv/config';
import { closeDb, getSql } from './client.js';

const DISTRIBUTED_TABLES = ['rag_chunks', 'rag_embeddings', 'rag_index_status'] as const;

async function configureCitus() {
  const sql = getSql();
  console.log('Configuring Citus distribution and pgvector settings...');

  try {
    const [citus] = await sql<{ installed: boolean }[]>`
      SELECT EXISTS (SELECT 1 FROM pg_extension WHERE extname = 'citus') AS installed
    `;

    if (citus?.installed) {
      const existing = await sql<{ table_name: string }[]>`
        SELECT logicalrelid::text AS table_name FROM pg_dist_partition
      `;
      const distributed = new Set(existing.map((row) => row.table_name));

      // rag_chunks first: rag_embeddings references it
      for (const table of DISTRIBUTED_TABLES) {
        if (distributed.has(table)) {
          console.log(`${table} already distributed`);
          continue;
        }
        console.log(`Distributing ${table} by tenant_id...`);
        if (table === 'rag_chunks') {
          await sql`SELECT create_distributed_table(${table}, 'tenant_id')`;
        } else {
          await sql`SELECT create_distributed_table(${table}, 'tenant_id', colocate_with => 'rag_chunks')`;
        }
      }
    } else {
      console.log('Citus extension not installed, skipping table distribution');
    }

    const [database] = await sql<{ name: string }[]>`SELECT current_database() AS name`;
    const dbName = database?.name ?? 'postgres';

    // pgvector HNSW query tuning (higher = better recall, slower queries)
    console.log('Setting hnsw.ef_search = 200...');
    await sql`ALTER DATABASE ${sql(dbName)} SET hnsw.ef_search = 200`;

    // Memory for index building (higher = faster index builds)
    console.log('Setting maintenance_work_mem = 2GB...');
    await sql`ALTER DATABASE ${sql(dbName)} SET maintenance_work_mem = '2GB'`;

    console.log('\nConfiguration completed successfully!');
    console.log('⚠️  Reconnect to database for settings to take effect');
  } catch (error) {
    console.error('Configuration failed:', error);
    process.exitCode = 1;
  } finally {
    await closeDb();
  }
}

void configureCitus();
