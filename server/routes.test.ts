// ABOUTME: Tests for the RAG API routes against in-memory queue, tracker, store and embedding stand-ins.
// ABOUTME: Requests go through Hono's app.request, so no port is opened.
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CONTEXT_HEADER, ContextBuilder } from './rag/context-builder.js';
import type { EnqueueAck, EnqueueRequest } from './rag/index-queue.js';
import { CONTEXT_INSTRUCTIONS, PromptEnricher } from './rag/prompt-enricher.js';
import { Retriever, type RetrievalResult } from './rag/retriever.js';
import { InMemoryStatusTracker } from './rag/status/memory-status-tracker.js';
import { FakeEmbeddingClient } from './rag/testing.js';
import { InMemoryVectorStore } from './rag/vector-store/memory-store.js';
import { createRoutes, type RouteDeps } from './routes.js';

class RecordingQueue {
  requests: Array<{ tenantId: number; request?: EnqueueRequest }> = [];

  enqueue(tenantId: number, request?: EnqueueRequest): EnqueueAck {
    this.requests.push({ tenantId, request });
    return { status: 'queued', tenantId, mode: request?.fullRebuild ? 'full' : 'incremental' };
  }
}

async function setup(overrides: Partial<RouteDeps> = {}) {
  const store = new InMemoryVectorStore();
  await store.upsert(7, { sourceTable: 'orders', sourceId: 1, chunkType: 'order', chunkText: 'order 1', chunkHash: 'h1' }, [1, 0]);
  await store.upsert(7, { sourceTable: 'orders', sourceId: 2, chunkType: 'order', chunkText: 'order 2', chunkHash: 'h2' }, [4, 3]);

  const queue = new RecordingQueue();
  const status = new InMemoryStatusTracker();
  const retriever = new Retriever({
    embeddings: new FakeEmbeddingClient({ vectorFor: () => [1, 0] }),
    store,
    k: 5,
    similarityFloor: 0.7,
    timeoutMs: 1000,
  });
  const enricher = new PromptEnricher({ retriever, contextBuilder: new ContextBuilder(3000), enabled: true });
  const app = createRoutes({ queue, status, retriever, enricher, ...overrides });

  return { app, queue, status };
}

function post(body?: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
  };
}

async function json(res: Response): Promise<unknown> {
  const body: unknown = await res.json();
  return body;
}

function failingRetriever(result: RetrievalResult): RouteDeps['retriever'] {
  return { retrieve: async () => result };
}

describe('POST /rag/index/:tenantId', () => {
  it('should enqueue a full rebuild and answer 202', async () => {
    const { app, queue } = await setup();

    const res = await app.request('/rag/index/7', post({ fullRebuild: true }));

    assert.strictEqual(res.status, 202);
    assert.deepStrictEqual(await json(res), { status: 'queued', tenantId: 7, mode: 'full' });
    assert.deepStrictEqual(queue.requests, [{ tenantId: 7, request: { fullRebuild: true } }]);
  });

  it('should accept an empty body as an incremental request', async () => {
    const { app, queue } = await setup();

    const res = await app.request('/rag/index/7', post());

    assert.strictEqual(res.status, 202);
    assert.deepStrictEqual(await json(res), { status: 'queued', tenantId: 7, mode: 'incremental' });
    assert.deepStrictEqual(queue.requests, [{ tenantId: 7, request: {} }]);
  });

  it('should pass changed keys through', async () => {
    const { app, queue } = await setup();
    const changedKeys = [{ sourceTable: 'stocks', sourceId: 12 }];

    const res = await app.request('/rag/index/7', post({ changedKeys }));

    assert.strictEqual(res.status, 202);
    assert.deepStrictEqual(queue.requests, [{ tenantId: 7, request: { changedKeys } }]);
  });

  it('should reject a non-numeric tenant id', async () => {
    const { app, queue } = await setup();

    const res = await app.request('/rag/index/abc', post());

    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(await json(res), { error: 'tenantId must be a positive integer' });
    assert.deepStrictEqual(queue.requests, []);
  });

  it('should reject an unknown source table', async () => {
    const { app } = await setup();

    const res = await app.request(
      '/rag/index/7',
      post({ changedKeys: [{ sourceTable: 'invoices', sourceId: 1 }] })
    );

    assert.strictEqual(res.status, 400);
    const body = await json(res);
    assert.ok(typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string');
    assert.match(body.error, /^Invalid request body: changedKeys\.0\.sourceTable: /);
  });

  it('should reject malformed JSON', async () => {
    const { app } = await setup();

    const res = await app.request('/rag/index/7', post('{"fullRebuild":'));

    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(await json(res), { error: 'Invalid request body: Required' });
  });
});

describe('GET /rag/status/:tenantId', () => {
  it('should answer 404 for a tenant that was never indexed', async () => {
    const { app } = await setup();

    const res = await app.request('/rag/status/3');

    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(await json(res), { error: 'Tenant 3 has never been indexed' });
  });

  it('should return the status row with ISO timestamps', async () => {
    const { app, status } = await setup();
    const at = new Date('2024-06-01T00:00:00.000Z');
    const begin = await status.tryBegin(3, at);
    assert.ok(begin.acquired);
    await status.complete(3, begin.runId, { mode: 'full', watermark: at, totalChunks: 12, retryKeys: [], at });

    const res = await app.request('/rag/status/3');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await json(res), {
      tenantId: 3,
      status: 'indexed',
      lastFullIndexAt: '2024-06-01T00:00:00.000Z',
      lastIncrementalIndexAt: '2024-06-01T00:00:00.000Z',
      totalChunks: 12,
      lastError: null,
      lastErrorAt: null,
      runId: begin.runId,
      retryKeys: [],
      createdAt: '2024-06-01T00:00:00.000Z',
      updatedAt: '2024-06-01T00:00:00.000Z',
    });
  });
});

describe('POST /rag/search', () => {
  it('should return scored chunks best first', async () => {
    const { app } = await setup();

    const res = await app.request('/rag/search', post({ tenantId: 7, text: 'orders' }));

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await json(res), {
      results: [
        { id: 1, sourceTable: 'orders', sourceId: 1, chunkType: 'order', chunkText: 'order 1', score: 1 },
        { id: 2, sourceTable: 'orders', sourceId: 2, chunkType: 'order', chunkText: 'order 2', score: 0.8 },
      ],
    });
  });

  it('should return an empty list for a tenant with nothing indexed', async () => {
    const { app } = await setup();

    const res = await app.request('/rag/search', post({ tenantId: 8, text: 'orders' }));

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await json(res), { results: [] });
  });

  it('should reject blank text', async () => {
    const { app } = await setup();

    const res = await app.request('/rag/search', post({ tenantId: 7, text: '   ' }));

    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(await json(res), { error: 'Invalid request body: text: text is required' });
  });

  it('should answer 504 on a retrieval timeout and 502 on other failures', async () => {
    const timedOut = await setup({ retriever: failingRetriever({ ok: false, reason: 'timeout' }) });
    const res = await timedOut.app.request('/rag/search', post({ tenantId: 7, text: 'orders' }));
    assert.strictEqual(res.status, 504);
    assert.deepStrictEqual(await json(res), { error: 'Search failed: timeout' });

    const broken = await setup({ retriever: failingRetriever({ ok: false, reason: 'store_failed' }) });
    const res2 = await broken.app.request('/rag/search', post({ tenantId: 7, text: 'orders' }));
    assert.strictEqual(res2.status, 502);
    assert.deepStrictEqual(await json(res2), { error: 'Search failed: store_failed' });
  });
});

describe('POST /rag/enrich', () => {
  it('should return the enriched prompt', async () => {
    const { app } = await setup();

    const res = await app.request(
      '/rag/enrich',
      post({ tenantId: 7, basePrompt: 'Base', query: 'recent orders' })
    );

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await json(res), {
      prompt: `Base\n\n${CONTEXT_HEADER}\n- [order] order 1\n- [order] order 2\n\n${CONTEXT_INSTRUCTIONS}`,
      enriched: true,
      reason: null,
    });
  });

  it('should fall back to the base prompt with a reason', async () => {
    const { app } = await setup();

    const res = await app.request('/rag/enrich', post({ tenantId: 8, basePrompt: 'Base', query: 'x' }));

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await json(res), { prompt: 'Base', enriched: false, reason: 'no_results' });
  });
});
