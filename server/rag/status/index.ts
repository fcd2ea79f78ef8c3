// ABOUTME: Per-tenant index status contract: pending → indexing → indexed | failed.
// ABOUTME: tryBegin is the single-flight guard; only the run holding the current run token may move the row on.
import type { IndexStatus, IndexingMode, SourceKey } from '../types.js';

export type BeginResult =
  | { acquired: true; runId: string; status: IndexStatus }
  | { acquired: false; status: IndexStatus };

export interface CompleteOptions {
  mode: IndexingMode;
  /** Run start time; full runs set both watermarks to it. */
  watermark: Date;
  totalChunks: number;
  /** Replaces the stored retry set. */
  retryKeys: SourceKey[];
  at: Date;
}

export interface FailOptions {
  reason: string;
  /** Replaces the stored retry set; the watermarks stay where they were. */
  retryKeys: SourceKey[];
  at: Date;
}

export interface IndexStatusTracker {
  get(tenantId: number): Promise<IndexStatus | null>;

  /**
   * Create the row if missing, then compare-and-set it into `indexing` under a
   * fresh run token. Fails while another run holds it, unless that run's
   * heartbeat is stale.
   */
  tryBegin(tenantId: number, now: Date): Promise<BeginResult>;

  /**
   * The remaining writes apply only while the row is `indexing` under `runId`.
   * They report false (or null) once a newer run has taken the row over.
   */
  heartbeat(tenantId: number, runId: string, at: Date): Promise<boolean>;
  complete(tenantId: number, runId: string, options: CompleteOptions): Promise<IndexStatus | null>;
  fail(tenantId: number, runId: string, options: FailOptions): Promise<boolean>;

  /** Operator reset back to `pending`, whatever the current status. Releases any run token. */
  reset(tenantId: number, at: Date): Promise<void>;
}

/** Default age after which an `indexing` row counts as a crashed run. */
export const DEFAULT_STALE_RUN_MS = 30 * 60_000;
