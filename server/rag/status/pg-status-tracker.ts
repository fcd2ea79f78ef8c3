// ABOUTME: IndexStatusTracker over the rag_index_status table.
// ABOUTME: tryBegin is one conditional UPDATE, so the database arbitrates concurrent triggers.
import { randomUUID } from 'node:crypto';
import { and, eq, lt, ne, or } from 'drizzle-orm';
import type { Database } from '../../../db/client.js';
import { ragIndexStatus, type IndexStatusRow } from '../../../db/schema.js';
import type { IndexStatus } from '../types.js';
import {
  DEFAULT_STALE_RUN_MS,
  type BeginResult,
  type CompleteOptions,
  type FailOptions,
  type IndexStatusTracker,
} from './index.js';

function toStatus(row: IndexStatusRow): IndexStatus {
  return {
    tenantId: row.tenantId,
    status: row.status,
    lastFullIndexAt: row.lastFullIndexAt,
    lastIncrementalIndexAt: row.lastIncrementalIndexAt,
    totalChunks: row.totalChunks,
    lastError: row.lastError,
    lastErrorAt: row.lastErrorAt,
    runId: row.runId,
    retryKeys: row.retryKeys,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class PgStatusTracker implements IndexStatusTracker {
  private staleRunMs: number;

  constructor(private db: Database, options: { staleRunMs?: number } = {}) {
    this.staleRunMs = options.staleRunMs ?? DEFAULT_STALE_RUN_MS;
  }

  async get(tenantId: number): Promise<IndexStatus | null> {
    const [row] = await this.db.select().from(ragIndexStatus).where(eq(ragIndexStatus.tenantId, tenantId));
    return row ? toStatus(row) : null;
  }

  async tryBegin(tenantId: number, now: Date): Promise<BeginResult> {
    await this.db
      .insert(ragIndexStatus)
      .values({ tenantId, status: 'pending', createdAt: now, updatedAt: now })
      .onConflictDoNothing();

    const staleBefore = new Date(now.getTime() - this.staleRunMs);
    const runId = randomUUID();
    const [claimed] = await this.db
      .update(ragIndexStatus)
      .set({ status: 'indexing', runId, updatedAt: now })
      .where(
        and(
          eq(ragIndexStatus.tenantId, tenantId),
          or(ne(ragIndexStatus.status, 'indexing'), lt(ragIndexStatus.updatedAt, staleBefore)),
        ),
      )
      .returning();

    if (claimed) {
      return { acquired: true, runId, status: toStatus(claimed) };
    }

    const current = await this.get(tenantId);
    if (!current) {
      throw new Error(`Index status row for tenant ${tenantId} disappeared`);
    }
    return { acquired: false, status: current };
  }

  async heartbeat(tenantId: number, runId: string, at: Date): Promise<boolean> {
    const rows = await this.db
      .update(ragIndexStatus)
      .set({ updatedAt: at })
      .where(this.ownedBy(tenantId, runId))
      .returning({ tenantId: ragIndexStatus.tenantId });
    return rows.length > 0;
  }

  async complete(tenantId: number, runId: string, options: CompleteOptions): Promise<IndexStatus | null> {
    const [row] = await this.db
      .update(ragIndexStatus)
      .set({
        status: 'indexed',
        totalChunks: options.totalChunks,
        lastIncrementalIndexAt: options.watermark,
        ...(options.mode === 'full' ? { lastFullIndexAt: options.watermark } : {}),
        retryKeys: options.retryKeys,
        updatedAt: options.at,
      })
      .where(this.ownedBy(tenantId, runId))
      .returning();

    return row ? toStatus(row) : null;
  }

  async fail(tenantId: number, runId: string, options: FailOptions): Promise<boolean> {
    const rows = await this.db
      .update(ragIndexStatus)
      .set({
        status: 'failed',
        lastError: options.reason,
        lastErrorAt: options.at,
        retryKeys: options.retryKeys,
        updatedAt: options.at,
      })
      .where(this.ownedBy(tenantId, runId))
      .returning({ tenantId: ragIndexStatus.tenantId });
    return rows.length > 0;
  }

  async reset(tenantId: number, at: Date): Promise<void> {
    await this.db
      .insert(ragIndexStatus)
      .values({ tenantId, status: 'pending', createdAt: at, updatedAt: at })
      .onConflictDoUpdate({
        target: ragIndexStatus.tenantId,
        set: { status: 'pending', runId: null, updatedAt: at },
      });
  }

  private ownedBy(tenantId: number, runId: string) {
    return and(
      eq(ragIndexStatus.tenantId, tenantId),
      eq(ragIndexStatus.status, 'indexing'),
      eq(ragIndexStatus.runId, runId),
    );
  }
}
