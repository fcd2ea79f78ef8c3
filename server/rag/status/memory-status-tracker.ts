// ABOUTME: In-process IndexStatusTracker for tests and single-process development.
// ABOUTME: State changes happen before the first await, so concurrent tryBegin calls see each other.
import { randomUUID } from 'node:crypto';
import type { IndexStatus } from '../types.js';
import {
  DEFAULT_STALE_RUN_MS,
  type BeginResult,
  type CompleteOptions,
  type FailOptions,
  type IndexStatusTracker,
} from './index.js';

function copy(row: IndexStatus): IndexStatus {
  return { ...row, retryKeys: row.retryKeys.map((key) => ({ ...key })) };
}

export class InMemoryStatusTracker implements IndexStatusTracker {
  private rows = new Map<number, IndexStatus>();
  private staleRunMs: number;

  constructor(options: { staleRunMs?: number } = {}) {
    this.staleRunMs = options.staleRunMs ?? DEFAULT_STALE_RUN_MS;
  }

  async get(tenantId: number): Promise<IndexStatus | null> {
    const row = this.rows.get(tenantId);
    return row ? copy(row) : null;
  }

  async tryBegin(tenantId: number, now: Date): Promise<BeginResult> {
    const row = this.ensure(tenantId, now);
    const stale = now.getTime() - row.updatedAt.getTime() > this.staleRunMs;

    if (row.status === 'indexing' && !stale) {
      return { acquired: false, status: copy(row) };
    }

    const runId = randomUUID();
    row.status = 'indexing';
    row.runId = runId;
    row.updatedAt = now;
    return { acquired: true, runId, status: copy(row) };
  }

  async heartbeat(tenantId: number, runId: string, at: Date): Promise<boolean> {
    const row = this.owned(tenantId, runId);
    if (!row) return false;
    row.updatedAt = at;
    return true;
  }

  async complete(tenantId: number, runId: string, options: CompleteOptions): Promise<IndexStatus | null> {
    const row = this.owned(tenantId, runId);
    if (!row) return null;

    row.status = 'indexed';
    row.totalChunks = options.totalChunks;
    row.lastIncrementalIndexAt = options.watermark;
    if (options.mode === 'full') row.lastFullIndexAt = options.watermark;
    row.retryKeys = options.retryKeys.map((key) => ({ ...key }));
    row.updatedAt = options.at;
    return copy(row);
  }

  async fail(tenantId: number, runId: string, options: FailOptions): Promise<boolean> {
    const row = this.owned(tenantId, runId);
    if (!row) return false;

    row.status = 'failed';
    row.lastError = options.reason;
    row.lastErrorAt = options.at;
    row.retryKeys = options.retryKeys.map((key) => ({ ...key }));
    row.updatedAt = options.at;
    return true;
  }

  async reset(tenantId: number, at: Date): Promise<void> {
    const row = this.ensure(tenantId, at);
    row.status = 'pending';
    row.runId = null;
    row.updatedAt = at;
  }

  private owned(tenantId: number, runId: string): IndexStatus | null {
    const row = this.rows.get(tenantId);
    return row?.status === 'indexing' && row.runId === runId ? row : null;
  }

  private ensure(tenantId: number, at: Date): IndexStatus {
    let row = this.rows.get(tenantId);
    if (!row) {
      row = {
        tenantId,
        status: 'pending',
        lastFullIndexAt: null,
        lastIncrementalIndexAt: null,
        totalChunks: 0,
        lastError: null,
        lastErrorAt: null,
        runId: null,
        retryKeys: [],
        createdAt: at,
        updatedAt: at,
      };
      this.rows.set(tenantId, row);
    }
    return row;
  }
}
