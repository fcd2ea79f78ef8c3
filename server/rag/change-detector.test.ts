// ABOUTME: Tests for chunk hashing and new/changed/unchanged classification.
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { classifyChunk, computeChunkHash } from './change-detector.js';
import { renderChunk } from './chunker.js';
import { orderRow } from './testing.js';

describe('computeChunkHash', () => {
  it('should return the SHA-256 hex digest of the text', () => {
    assert.strictEqual(computeChunkHash(''), 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    assert.strictEqual(computeChunkHash('abc'), 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('should be stable for identical renders of the same row', () => {
    const first = computeChunkHash(renderChunk(orderRow(1)));
    const second = computeChunkHash(renderChunk(orderRow(1, { updatedAt: new Date('2030-01-01T00:00:00.000Z') })));
    assert.strictEqual(first, second);
    assert.match(first, /^[0-9a-f]{64}$/);
  });
});

describe('classifyChunk', () => {
  it('should classify a chunk without a stored hash as new', () => {
    assert.strictEqual(classifyChunk(null, 'text').kind, 'new');
    assert.strictEqual(classifyChunk(undefined, 'text').kind, 'new');
  });

  it('should classify a matching hash as unchanged', () => {
    const result = classifyChunk(computeChunkHash('text'), 'text');
    assert.deepStrictEqual(result, { kind: 'unchanged', hash: computeChunkHash('text') });
  });

  it('should classify a different hash as changed', () => {
    const before = renderChunk(orderRow(2));
    const after = renderChunk(orderRow(2, { price: 120 }));
    const result = classifyChunk(computeChunkHash(before), after);

    assert.strictEqual(result.kind, 'changed');
    assert.strictEqual(result.hash, computeChunkHash(after));
  });
});
