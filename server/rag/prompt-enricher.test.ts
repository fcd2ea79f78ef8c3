// ABOUTME: Tests for prompt enrichment and its fallbacks to the unchanged base prompt.
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CONTEXT_HEADER, ContextBuilder } from './context-builder.js';
import { CONTEXT_INSTRUCTIONS, PromptEnricher } from './prompt-enricher.js';
import { Retriever, type RetrievalResult } from './retriever.js';
import { FakeEmbeddingClient } from './testing.js';
import type { ScoredChunk } from './types.js';
import { InMemoryVectorStore } from './vector-store/memory-store.js';

const BASE = 'You are a helpful assistant for a marketplace seller.';

function scored(id: number, score: number, chunkText: string): ScoredChunk {
  const at = new Date('2024-05-01T00:00:00.000Z');
  return {
    score,
    chunk: {
      id,
      tenantId: 3,
      sourceTable: 'orders',
      sourceId: id,
      chunkType: 'order',
      chunkText,
      chunkHash: `hash-${id}`,
      createdAt: at,
      updatedAt: at,
    },
  };
}

function enricher(result: RetrievalResult | Error, options: { enabled?: boolean; maxChars?: number } = {}) {
  const calls: string[] = [];
  const instance = new PromptEnricher({
    enabled: options.enabled ?? true,
    contextBuilder: new ContextBuilder(options.maxChars ?? 3000),
    retriever: {
      retrieve: async (_tenantId, query) => {
        calls.push(query);
        if (result instanceof Error) throw result;
        return result;
      },
    },
  });
  return { instance, calls };
}

describe('PromptEnricher', () => {
  it('should append the context block and instructions to the base prompt', async () => {
    const { instance } = enricher({
      ok: true,
      chunks: [scored(2, 0.8, 'Order #A-2 returned'), scored(1, 0.9, 'Order #A-1 delivered')],
    });

    const result = await instance.enrichDetailed(BASE, 3, 'what happened to my orders?');

    assert.strictEqual(result.enriched, true);
    assert.strictEqual(result.chunks, 2);
    assert.strictEqual(
      result.prompt,
      `${BASE}\n\n${CONTEXT_HEADER}\n- [order] Order #A-1 delivered\n- [order] Order #A-2 returned\n\n${CONTEXT_INSTRUCTIONS}`
    );
  });

  it('should return the base prompt untouched when disabled', async () => {
    const { instance, calls } = enricher({ ok: true, chunks: [scored(1, 0.9, 'x')] }, { enabled: false });

    const result = await instance.enrichDetailed(BASE, 3, 'orders');

    assert.deepStrictEqual(result, { prompt: BASE, enriched: false, reason: 'disabled', chunks: 0 });
    assert.deepStrictEqual(calls, []);
  });

  it('should pass the retrieval failure reason through', async () => {
    const { instance } = enricher({ ok: false, reason: 'timeout', error: new Error('Retrieval exceeded 500ms') });

    const result = await instance.enrichDetailed(BASE, 3, 'orders');

    assert.deepStrictEqual(result, { prompt: BASE, enriched: false, reason: 'timeout', chunks: 0 });
  });

  it('should fall back when no chunk fits the context budget', async () => {
    const { instance } = enricher({ ok: true, chunks: [scored(1, 0.9, 'z'.repeat(100))] }, { maxChars: 50 });

    const result = await instance.enrichDetailed(BASE, 3, 'orders');

    assert.strictEqual(result.prompt, BASE);
    assert.strictEqual(result.reason, 'empty_context');
  });

  it('should not throw when retrieval itself throws', async () => {
    const { instance } = enricher(new Error('socket hang up'));

    const result = await instance.enrichDetailed(BASE, 3, 'orders');

    assert.deepStrictEqual(result, { prompt: BASE, enriched: false, reason: 'error', chunks: 0 });
  });

  it('should return only the prompt from enrich', async () => {
    const { instance } = enricher({ ok: false, reason: 'no_results' });
    assert.strictEqual(await instance.enrich(BASE, 3, 'orders'), BASE);
  });
});

describe('PromptEnricher over a live retriever', () => {
  async function live(embeddings: FakeEmbeddingClient, timeoutMs: number): Promise<PromptEnricher> {
    const store = new InMemoryVectorStore();
    await store.upsert(
      3,
      { sourceTable: 'orders', sourceId: 1, chunkType: 'order', chunkText: 'Order #A-1 delivered', chunkHash: 'h1' },
      new Array<number>(embeddings.dimensions).fill(1)
    );
    const retriever = new Retriever({ embeddings, store, k: 5, similarityFloor: 0.7, timeoutMs });
    return new PromptEnricher({ retriever, contextBuilder: new ContextBuilder(3000), enabled: true });
  }

  it('should return the base prompt when every embedding call throws', async () => {
    const enricher = await live(new FakeEmbeddingClient({ failWith: () => new Error('503 unavailable') }), 200);

    assert.strictEqual(await enricher.enrich(BASE, 3, 'orders'), BASE);
  });

  it('should return the base prompt within the timeout when the provider never answers', async () => {
    const enricher = await live(new FakeEmbeddingClient({ delayMs: 60_000 }), 50);

    const started = Date.now();
    const prompt = await enricher.enrich(BASE, 3, 'orders');

    assert.strictEqual(prompt, BASE);
    assert.ok(Date.now() - started < 1000);
  });
});
