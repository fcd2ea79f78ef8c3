// ABOUTME: Tests for the query-time retriever over the in-memory store and a fake embedding client.
// ABOUTME: Each failure stage maps to its own reason; nothing throws.
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { VectorStoreError } from './errors.js';
import { Retriever } from './retriever.js';
import { FakeEmbeddingClient } from './testing.js';
import type { ChunkInput, ScoredChunk } from './types.js';
import { InMemoryVectorStore } from './vector-store/memory-store.js';

function chunk(sourceId: number, overrides: Partial<ChunkInput> = {}): ChunkInput {
  return {
    sourceTable: 'orders',
    sourceId,
    chunkType: 'order',
    chunkText: `order ${sourceId}`,
    chunkHash: `hash-${sourceId}`,
    ...overrides,
  };
}

class BrokenStore extends InMemoryVectorStore {
  async query(): Promise<ScoredChunk[]> {
    throw new VectorStoreError('Vector store query failed: relation "rag_embeddings" does not exist');
  }
}

async function seededStore(): Promise<InMemoryVectorStore> {
  const store = new InMemoryVectorStore();
  await store.upsert(7, chunk(1), [1, 0]);
  await store.upsert(7, chunk(2), [4, 3]);
  await store.upsert(7, chunk(3), [3, 4]);
  await store.upsert(7, chunk(4, { sourceTable: 'stocks', chunkType: 'stock' }), [1, 0]);
  await store.upsert(8, chunk(1), [1, 0]);
  return store;
}

function retriever(store: InMemoryVectorStore, embeddings = new FakeEmbeddingClient({ vectorFor: () => [1, 0] })) {
  return new Retriever({ embeddings, store, k: 5, similarityFloor: 0.7, timeoutMs: 1000 });
}

describe('Retriever', () => {
  it('should return tenant chunks above the floor, best first', async () => {
    const result = await retriever(await seededStore()).retrieve(7, 'delivered orders');

    assert.ok(result.ok);
    assert.deepStrictEqual(
      result.chunks.map((r) => [r.chunk.sourceTable, r.chunk.sourceId, r.score]),
      [
        ['orders', 1, 1],
        ['stocks', 4, 1],
        ['orders', 2, 0.8],
      ]
    );
  });

  it('should restrict results to the requested chunk types', async () => {
    const result = await retriever(await seededStore()).retrieve(7, 'stock', { chunkTypes: ['stock'] });

    assert.ok(result.ok);
    assert.deepStrictEqual(result.chunks.map((r) => r.chunk.sourceId), [4]);
  });

  it('should refuse a blank query without embedding it', async () => {
    const embeddings = new FakeEmbeddingClient();
    const result = await retriever(await seededStore(), embeddings).retrieve(7, '   ');

    assert.deepStrictEqual(result, { ok: false, reason: 'empty_query' });
    assert.deepStrictEqual(embeddings.embedded, []);
  });

  it('should report no_results for a tenant with nothing indexed', async () => {
    const result = await retriever(await seededStore()).retrieve(99, 'anything');
    assert.deepStrictEqual(result, { ok: false, reason: 'no_results' });
  });

  it('should time out a slow embedding call', async () => {
    const embeddings = new FakeEmbeddingClient({ delayMs: 500 });
    const slow = new Retriever({ embeddings, store: await seededStore(), k: 5, similarityFloor: 0.7, timeoutMs: 20 });

    const result = await slow.retrieve(7, 'orders');

    assert.strictEqual(result.ok, false);
    assert.strictEqual(result.ok ? undefined : result.reason, 'timeout');
    assert.strictEqual(result.ok ? undefined : result.error?.message, 'Retrieval exceeded 20ms');
  });

  it('should report embedding_failed when the provider rejects the query', async () => {
    const embeddings = new FakeEmbeddingClient({ failWith: () => new Error('401 invalid api key') });
    const result = await retriever(await seededStore(), embeddings).retrieve(7, 'orders');

    assert.strictEqual(result.ok ? undefined : result.reason, 'embedding_failed');
    assert.strictEqual(result.ok ? undefined : result.error?.message, '401 invalid api key');
  });

  it('should report store_failed when the similarity query fails', async () => {
    const result = await retriever(new BrokenStore()).retrieve(7, 'orders');

    assert.strictEqual(result.ok ? undefined : result.reason, 'store_failed');
    assert.strictEqual(
      result.ok ? undefined : result.error?.message,
      'Vector store query failed: relation "rag_embeddings" does not exist'
    );
  });
});
