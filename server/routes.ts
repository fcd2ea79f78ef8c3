// ABOUTME: API route handlers for triggering tenant indexing, reading index status, search and prompt enrichment.
// ABOUTME: Request bodies are validated with zod; handlers log and answer 500 on unexpected failures.
import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { CHUNK_TYPES } from '../db/schema.js';
import type { EnqueueAck, EnqueueRequest } from './rag/index-queue.js';
import type { PromptEnricher } from './rag/prompt-enricher.js';
import type { Retriever } from './rag/retriever.js';
import type { IndexStatusTracker } from './rag/status/index.js';
import { SOURCE_TABLES, type SourceTable } from './rag/types.js';

export interface RouteDeps {
  queue: { enqueue(tenantId: number, request?: EnqueueRequest): EnqueueAck };
  status: Pick<IndexStatusTracker, 'get'>;
  retriever: Pick<Retriever, 'retrieve'>;
  enricher: Pick<PromptEnricher, 'enrichDetailed'>;
}

const SOURCE_TABLE_NAMES = [
  SOURCE_TABLES.order,
  SOURCE_TABLES.product,
  SOURCE_TABLES.stock,
  SOURCE_TABLES.review,
  SOURCE_TABLES.sale,
] as const satisfies readonly SourceTable[];

const tenantIdSchema = z.coerce.number().int().positive();

const indexBodySchema = z.object({
  fullRebuild: z.boolean().optional(),
  changedKeys: z
    .array(z.object({ sourceTable: z.enum(SOURCE_TABLE_NAMES), sourceId: z.number().int().positive() }))
    .optional(),
});

const searchBodySchema = z.object({
  tenantId: tenantIdSchema,
  text: z.string().trim().min(1, 'text is required'),
  chunkTypes: z.array(z.enum(CHUNK_TYPES)).optional(),
});

const enrichBodySchema = z.object({
  tenantId: tenantIdSchema,
  basePrompt: z.string(),
  query: z.string(),
  chunkTypes: z.array(z.enum(CHUNK_TYPES)).optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

/** Parse a JSON body; an empty body reads as `{}`. Returns undefined on malformed JSON. */
async function readBody(c: Context): Promise<unknown> {
  const raw = await c.req.text();
  if (raw.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return undefined;
  }
}

export function createRoutes(deps: RouteDeps): Hono {
  const app = new Hono();

  app.post('/rag/index/:tenantId', async (c) => {
    try {
      const tenantId = tenantIdSchema.safeParse(c.req.param('tenantId'));
      if (!tenantId.success) {
        return c.json({ error: 'tenantId must be a positive integer' }, 400);
      }

      const body = indexBodySchema.safeParse(await readBody(c));
      if (!body.success) {
        return c.json({ error: `Invalid request body: ${describeIssues(body.error)}` }, 400);
      }

      const ack = deps.queue.enqueue(tenantId.data, body.data);
      return c.json(ack, 202);
    } catch (error) {
      console.error('Index trigger error:', error);
      const message = error instanceof Error ? error.message : 'Failed to enqueue indexing';
      return c.json({ error: message }, 500);
    }
  });

  app.get('/rag/status/:tenantId', async (c) => {
    try {
      const tenantId = tenantIdSchema.safeParse(c.req.param('tenantId'));
      if (!tenantId.success) {
        return c.json({ error: 'tenantId must be a positive integer' }, 400);
      }

      const status = await deps.status.get(tenantId.data);
      if (!status) {
        return c.json({ error: `Tenant ${tenantId.data} has never been indexed` }, 404);
      }
      return c.json(status);
    } catch (error) {
      console.error('Status error:', error);
      const message = error instanceof Error ? error.message : 'Failed to read index status';
      return c.json({ error: message }, 500);
    }
  });

  app.post('/rag/search', async (c) => {
    try {
      const body = searchBodySchema.safeParse(await readBody(c));
      if (!body.success) {
        return c.json({ error: `Invalid request body: ${describeIssues(body.error)}` }, 400);
      }

      const { tenantId, text, chunkTypes } = body.data;
      const result = await deps.retriever.retrieve(tenantId, text, { chunkTypes });

      if (!result.ok) {
        if (result.reason === 'no_results') {
          return c.json({ results: [] });
        }
        console.warn(`Search for tenant ${tenantId} failed (${result.reason}):`, result.error?.message);
        return c.json({ error: `Search failed: ${result.reason}` }, result.reason === 'timeout' ? 504 : 502);
      }

      return c.json({
        results: result.chunks.map(({ chunk, score }) => ({
          id: chunk.id,
          sourceTable: chunk.sourceTable,
          sourceId: chunk.sourceId,
          chunkType: chunk.chunkType,
          chunkText: chunk.chunkText,
          score,
        })),
      });
    } catch (error) {
      console.error('Search error:', error);
      const message = error instanceof Error ? error.message : 'Search failed';
      return c.json({ error: message }, 500);
    }
  });

  app.post('/rag/enrich', async (c) => {
    try {
      const body = enrichBodySchema.safeParse(await readBody(c));
      if (!body.success) {
        return c.json({ error: `Invalid request body: ${describeIssues(body.error)}` }, 400);
      }

      const { tenantId, basePrompt, query, chunkTypes } = body.data;
      const result = await deps.enricher.enrichDetailed(basePrompt, tenantId, query, { chunkTypes });
      return c.json({ prompt: result.prompt, enriched: result.enriched, reason: result.reason ?? null });
    } catch (error) {
      console.error('Enrich error:', error);
      const message = error instanceof Error ? error.message : 'Failed to enrich prompt';
      return c.json({ error: message }, 500);
    }
  });

  return app;
}
