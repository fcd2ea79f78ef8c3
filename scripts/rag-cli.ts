// ABOUTME: Operator CLI for the RAG index: run indexing, inspect or reset status, try a search.
// ABOUTME: Talks to Postgres and OpenAI directly through the same services the server uses.
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { closeDb, getDb } from '../db/client.js';
import { loadConfig } from '../server/config.js';
import { PgStatusTracker } from '../server/rag/status/pg-status-tracker.js';
import { createServices, type Services } from '../server/services.js';

function parseTenantId(value: string): number {
  const tenantId = Number(value);
  if (!Number.isInteger(tenantId) || tenantId <= 0) {
    throw new InvalidArgumentError('tenantId must be a positive integer');
  }
  return tenantId;
}

async function withServices(task: (services: Services) => Promise<void>): Promise<void> {
  try {
    await task(createServices(loadConfig()));
  } finally {
    await closeDb();
  }
}

/** Status commands need only the database, not an embedding provider. */
async function withStatusTracker(task: (status: PgStatusTracker) => Promise<void>): Promise<void> {
  try {
    const config = loadConfig();
    await task(new PgStatusTracker(getDb(config.databaseUrl), { staleRunMs: config.indexing.staleRunMs }));
  } finally {
    await closeDb();
  }
}

const program = new Command('rag')
  .description('Manage the per-tenant RAG vector index')
  .showHelpAfterError();

program
  .command('run')
  .description('Index one tenant now (incremental unless --full)')
  .argument('<tenantId>', 'tenant id', parseTenantId)
  .option('--full', 'rebuild the whole index and delete stale chunks', false)
  .action(async (tenantId: number, options: { full: boolean }) => {
    await withServices(async ({ indexer }) => {
      const result = await indexer.run(tenantId, { fullRebuild: options.full });
      console.log(JSON.stringify(result, null, 2));
      if (result.status === 'failed') process.exitCode = 1;
    });
  });

program
  .command('status')
  .description('Show the index status of a tenant')
  .argument('<tenantId>', 'tenant id', parseTenantId)
  .action(async (tenantId: number) => {
    await withStatusTracker(async (status) => {
      const current = await status.get(tenantId);
      if (!current) {
        console.log(`Tenant ${tenantId} has never been indexed`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(current, null, 2));
    });
  });

program
  .command('reset')
  .description('Force a tenant back to pending, e.g. after a crashed run')
  .argument('<tenantId>', 'tenant id', parseTenantId)
  .action(async (tenantId: number) => {
    await withStatusTracker(async (status) => {
      await status.reset(tenantId, new Date());
      console.log(`Tenant ${tenantId} reset to pending`);
    });
  });

program
  .command('search')
  .description('Run a similarity search against a tenant index')
  .argument('<tenantId>', 'tenant id', parseTenantId)
  .argument('<query...>', 'query text')
  .action(async (tenantId: number, query: string[]) => {
    await withServices(async ({ retriever }) => {
      const result = await retriever.retrieve(tenantId, query.join(' '));
      if (!result.ok) {
        console.log(`No results (${result.reason})${result.error ? `: ${result.error.message}` : ''}`);
        return;
      }
      for (const { chunk, score } of result.chunks) {
        console.log(`${score.toFixed(3)}  [${chunk.chunkType}] ${chunk.chunkText}`);
      }
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
