// ABOUTME: Tests for environment configuration parsing and validation.
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should apply defaults when nothing is set', () => {
    const config = loadConfig({});

    assert.strictEqual(config.port, 3000);
    assert.strictEqual(config.databaseUrl, undefined);
    assert.strictEqual(config.openai.apiKey, undefined);
    assert.strictEqual(config.openai.embeddingsModel, 'text-embedding-3-small');
    assert.deepStrictEqual(config.indexing, {
      batchSize: 100,
      concurrency: 2,
      maxAttempts: 5,
      retryBaseDelayMs: 1000,
      maxConsecutiveStoreFailures: 3,
      staleRunMs: 30 * 60_000,
      lookbackDays: 90,
    });
    assert.deepStrictEqual(config.scheduler, {
      intervalMs: 60 * 60_000,
      fullRebuildIntervalMs: 168 * 60 * 60_000,
      workerConcurrency: 2,
    });
    assert.deepStrictEqual(config.retrieval, {
      enabled: true,
      k: 5,
      similarityFloor: 0.5,
      maxContextChars: 3000,
      timeoutMs: 2000,
    });
  });

  it('should coerce numbers and boolean flags from strings', () => {
    const config = loadConfig({
      PORT: '8080',
      OPENAI_API_KEY: 'test-key',
      RAG_ENABLED: '0',
      RAG_MAX_CHUNKS: '8',
      RAG_SIMILARITY_THRESHOLD: '0.7',
      RAG_STALE_RUN_MINUTES: '5',
    });

    assert.strictEqual(config.port, 8080);
    assert.strictEqual(config.openai.apiKey, 'test-key');
    assert.strictEqual(config.retrieval.enabled, false);
    assert.strictEqual(config.retrieval.k, 8);
    assert.strictEqual(config.retrieval.similarityFloor, 0.7);
    assert.strictEqual(config.indexing.staleRunMs, 5 * 60_000);
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ OPENAI_API_KEY: '   ', PORT: '' });

    assert.strictEqual(config.openai.apiKey, undefined);
    assert.strictEqual(config.port, 3000);
  });

  it('should report every invalid key', () => {
    assert.throws(
      () => loadConfig({ RAG_MAX_CHUNKS: 'many', RAG_ENABLED: 'yes' }),
      (error: unknown) =>
        error instanceof Error &&
        error.message.startsWith('Invalid configuration: ') &&
        error.message.includes('RAG_MAX_CHUNKS') &&
        error.message.includes('RAG_ENABLED'),
    );
  });
});
