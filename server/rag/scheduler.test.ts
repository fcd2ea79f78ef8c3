// ABOUTME: Tests for the periodic scheduler's choice between full and incremental runs.
import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { EnqueueAck, EnqueueRequest } from './index-queue.js';
import { IndexScheduler } from './scheduler.js';
import { InMemoryStatusTracker } from './status/memory-status-tracker.js';
import { InMemorySourceReader, orderRow } from './testing.js';

const DAY = 24 * 60 * 60_000;
const NOW = new Date('2024-06-10T00:00:00.000Z');

class RecordingQueue {
  requests: Array<{ tenantId: number; request?: EnqueueRequest }> = [];

  enqueue(tenantId: number, request?: EnqueueRequest): EnqueueAck {
    this.requests.push({ tenantId, request });
    return { status: 'queued', tenantId, mode: request?.fullRebuild ? 'full' : 'incremental' };
  }
}

async function indexedAt(status: InMemoryStatusTracker, tenantId: number, lastFull: Date): Promise<void> {
  const begin = await status.tryBegin(tenantId, lastFull);
  assert.ok(begin.acquired);
  await status.complete(tenantId, begin.runId, {
    mode: 'full',
    watermark: lastFull,
    totalChunks: 1,
    retryKeys: [],
    at: lastFull,
  });
}

describe('IndexScheduler', () => {
  it('should run never-indexed and stale tenants in full and the rest incrementally', async () => {
    const source = new InMemorySourceReader();
    source.put(1, orderRow(1));
    source.put(2, orderRow(1));
    source.put(3, orderRow(1));

    const status = new InMemoryStatusTracker();
    await indexedAt(status, 2, new Date(NOW.getTime() - 2 * DAY));
    await indexedAt(status, 3, new Date(NOW.getTime() - 8 * DAY));

    const queue = new RecordingQueue();
    const scheduler = new IndexScheduler({
      queue,
      source,
      status,
      intervalMs: 15 * 60_000,
      fullRebuildIntervalMs: 7 * DAY,
      now: () => NOW,
    });

    const summary = await scheduler.tick();

    assert.deepStrictEqual(summary, { tenants: 3, full: 2, incremental: 1 });
    assert.deepStrictEqual(queue.requests, [
      { tenantId: 1, request: { fullRebuild: true } },
      { tenantId: 2, request: { fullRebuild: false } },
      { tenantId: 3, request: { fullRebuild: true } },
    ]);
  });

  it('should treat a last full index exactly one interval old as due', async () => {
    const source = new InMemorySourceReader();
    source.put(4, orderRow(1));
    const status = new InMemoryStatusTracker();
    await indexedAt(status, 4, new Date(NOW.getTime() - 7 * DAY));

    const queue = new RecordingQueue();
    const scheduler = new IndexScheduler({
      queue,
      source,
      status,
      intervalMs: 60_000,
      fullRebuildIntervalMs: 7 * DAY,
      now: () => NOW,
    });

    assert.deepStrictEqual(await scheduler.tick(), { tenants: 1, full: 1, incremental: 0 });
  });

  it('should start and stop its timer without leaving it running', () => {
    const scheduler = new IndexScheduler({
      queue: new RecordingQueue(),
      source: new InMemorySourceReader(),
      status: new InMemoryStatusTracker(),
      intervalMs: 60_000,
      fullRebuildIntervalMs: DAY,
    });

    scheduler.start();
    scheduler.start();
    scheduler.stop();
    scheduler.stop();
  });
});
