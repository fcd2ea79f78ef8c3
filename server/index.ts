// ABOUTME: Main Hono server entry point: wires the RAG indexer, queue, scheduler and enricher behind the API routes.
// ABOUTME: Serves /health and /api on PORT; SIGINT/SIGTERM stop the scheduler and drain running jobs.
import 'dotenv/config';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { closeDb } from '../db/client.js';
import { loadConfig } from './config.js';
import { initEmbeddingServices } from './embeddings/index.js';
import { IndexingQueue } from './rag/index-queue.js';
import { IndexScheduler } from './rag/scheduler.js';
import { createRoutes } from './routes.js';
import { createServices } from './services.js';

function main(): void {
  const config = loadConfig();
  initEmbeddingServices(config);

  const services = createServices(config);
  const queue = new IndexingQueue(services.indexer, { concurrency: config.scheduler.workerConcurrency });
  const scheduler = new IndexScheduler({
    queue,
    source: services.source,
    status: services.status,
    intervalMs: config.scheduler.intervalMs,
    fullRebuildIntervalMs: config.scheduler.fullRebuildIntervalMs,
  });

  const app = new Hono();

  app.use('*', logger());
  app.use('*', cors());

  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString(), queue: queue.stats() });
  });

  app.route(
    '/api',
    createRoutes({ queue, status: services.status, retriever: services.retriever, enricher: services.enricher }),
  );

  const server = serve({
    fetch: app.fetch,
    port: config.port,
  });
  scheduler.start();

  console.log(`Server running on http://localhost:${config.port}`);

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    scheduler.stop();
    server.close();
    queue
      .shutdown()
      .then(() => closeDb())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main();
