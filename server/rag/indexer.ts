// ABOUTME: Indexing orchestrator: extract → render → hash/classify → embed → store, one tenant per run.
// ABOUTME: Full runs also delete chunks whose source row is gone; status moves pending → indexing → indexed | failed.
import type { EmbeddingClient, EmbedOutcome } from '../embeddings/index.js';
import { throwIfAborted, withRetry } from './async.js';
import { classifyChunk } from './change-detector.js';
import { renderChunk } from './chunker.js';
import { EmbeddingError, RunSupersededError, VectorStoreError, errorMessage } from './errors.js';
import type { SourceReader } from './source/index.js';
import type { IndexStatusTracker } from './status/index.js';
import {
  sourceKeyOf,
  type ChunkInput,
  type IndexStatus,
  type IndexingMode,
  type SourceKey,
  type SourceRow,
} from './types.js';
import type { VectorStore } from './vector-store/index.js';

export interface IndexingMetrics {
  newChunks: number;
  changedChunks: number;
  unchangedChunks: number;
  deletedChunks: number;
  embeddingsGenerated: number;
  /** Chunks stored without a vector after exhausting their embedding attempts. */
  failedChunks: number;
  /** Rows whose store write failed; the next run reads them again by key. */
  failedWrites: number;
}

export interface IndexingResult {
  tenantId: number;
  status: 'completed' | 'skipped' | 'failed';
  mode: IndexingMode;
  totalChunks: number;
  metrics: IndexingMetrics;
  errors: string[];
  durationMs: number;
}

export interface RunOptions {
  fullRebuild?: boolean;
  /** Rows known to have changed, read in addition to the updated_at window. */
  changedKeys?: SourceKey[];
  /** Aborting cancels the run before its next batch; status becomes failed. */
  signal?: AbortSignal;
}

export interface RagIndexerOptions {
  source: SourceReader;
  store: VectorStore;
  embeddings: EmbeddingClient;
  status: IndexStatusTracker;
  batchSize?: number;
  concurrency?: number;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  maxConsecutiveStoreFailures?: number;
  now?: () => Date;
}

export const SUPERSEDED_REASON = 'superseded';

/** Mutable state shared by the batch workers of one run. */
interface RunState {
  tenantId: number;
  runId: string;
  metrics: IndexingMetrics;
  /** Keys of failed store writes, persisted as the tenant's retry set. */
  retryKeys: SourceKey[];
  errors: string[];
  consecutiveStoreFailures: number;
}

function emptyMetrics(): IndexingMetrics {
  return {
    newChunks: 0,
    changedChunks: 0,
    unchangedChunks: 0,
    deletedChunks: 0,
    embeddingsGenerated: 0,
    failedChunks: 0,
    failedWrites: 0,
  };
}

export class RagIndexer {
  private source: SourceReader;
  private store: VectorStore;
  private embeddings: EmbeddingClient;
  private status: IndexStatusTracker;
  private batchSize: number;
  private concurrency: number;
  private maxAttempts: number;
  private retryBaseDelayMs: number;
  private maxConsecutiveStoreFailures: number;
  private now: () => Date;

  constructor(options: RagIndexerOptions) {
    this.source = options.source;
    this.store = options.store;
    this.embeddings = options.embeddings;
    this.status = options.status;
    this.batchSize = Math.max(1, options.batchSize ?? 100);
    this.concurrency = Math.max(1, options.concurrency ?? 2);
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 5);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.maxConsecutiveStoreFailures = Math.max(1, options.maxConsecutiveStoreFailures ?? 3);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one indexing pass for a tenant. Never throws for run-level failures:
   * they are recorded in IndexStatus and returned as `status: 'failed'`.
   */
  async run(tenantId: number, options: RunOptions = {}): Promise<IndexingResult> {
    const startedAt = this.now();
    const begin = await this.status.tryBegin(tenantId, startedAt);
    const mode: IndexingMode = options.fullRebuild || !begin.status.lastFullIndexAt ? 'full' : 'incremental';

    if (!begin.acquired) {
      console.log(`[Indexer] Tenant ${tenantId} is already indexing, skipping ${mode} run`);
      return this.result(tenantId, 'skipped', mode, begin.status.totalChunks, emptyMetrics(), [], startedAt);
    }

    const { signal } = options;
    const { runId } = begin;
    const state: RunState = {
      tenantId,
      runId,
      metrics: emptyMetrics(),
      retryKeys: [],
      errors: [],
      consecutiveStoreFailures: 0,
    };
    console.log(`[Indexer] Starting ${mode} run for tenant ${tenantId}`);

    try {
      throwIfAborted(signal);
      const rows = await this.extract(tenantId, mode, begin.status, options, state);

      throwIfAborted(signal);
      const work = await this.classify(tenantId, rows, state.metrics);
      await this.embedAndStore(work, state, signal);

      if (mode === 'full') {
        throwIfAborted(signal);
        await this.reconcile(tenantId, rows, state.metrics);
      }

      throwIfAborted(signal);
      const totalChunks = await this.store.count(tenantId);
      const completed = await this.status.complete(tenantId, runId, {
        mode,
        watermark: startedAt,
        totalChunks,
        retryKeys: dedupeKeys(state.retryKeys),
        at: this.now(),
      });
      if (!completed) {
        throw new RunSupersededError(tenantId);
      }

      const m = state.metrics;
      console.log(
        `[Indexer] Tenant ${tenantId} ${mode} run completed: ${m.newChunks} new, ${m.changedChunks} changed, ` +
          `${m.unchangedChunks} unchanged, ${m.deletedChunks} deleted, ${m.embeddingsGenerated} embedded, ` +
          `${m.failedChunks} pending, ${m.failedWrites} write(s) to retry (${totalChunks} total)`
      );
      return this.result(tenantId, 'completed', mode, totalChunks, state.metrics, state.errors, startedAt);
    } catch (error) {
      const reason = signal?.aborted ? SUPERSEDED_REASON : errorMessage(error);
      state.errors.push(reason);

      if (signal?.aborted) {
        console.warn(`[Indexer] Tenant ${tenantId} ${mode} run superseded`);
      } else {
        console.error(`[Indexer] Tenant ${tenantId} ${mode} run failed:`, error);
      }

      // Keys this run was asked to read stay owed to the next run
      const retryKeys = dedupeKeys([...begin.status.retryKeys, ...(options.changedKeys ?? []), ...state.retryKeys]);
      try {
        const recorded = await this.status.fail(tenantId, runId, { reason, retryKeys, at: this.now() });
        if (!recorded) {
          console.warn(`[Indexer] Tenant ${tenantId} is held by a newer run; leaving its status alone`);
        }
      } catch (statusError) {
        console.error(`[Indexer] Could not record failure for tenant ${tenantId}:`, statusError);
      }
      return this.result(tenantId, 'failed', mode, begin.status.totalChunks, state.metrics, state.errors, startedAt);
    }
  }

  private async extract(
    tenantId: number,
    mode: IndexingMode,
    status: IndexStatus,
    options: RunOptions,
    state: RunState,
  ): Promise<SourceRow[]> {
    if (mode === 'full') {
      return dedupe(await this.source.selectAll(tenantId));
    }

    const since = status.lastIncrementalIndexAt ?? status.lastFullIndexAt ?? new Date(0);
    const changed = await this.source.selectChanged(tenantId, since);

    const requested = dedupeKeys([
      ...(await this.store.listPendingKeys(tenantId)),
      ...status.retryKeys,
      ...(options.changedKeys ?? []),
    ]);
    if (requested.length === 0) {
      return dedupe(changed);
    }

    const byKey = await this.source.selectByKeys(tenantId, requested);
    const found = new Set(byKey.map(sourceKeyOf));

    // Requested rows that no longer exist at the source
    for (const key of requested) {
      if (!found.has(sourceKeyOf(key)) && (await this.store.delete(tenantId, key.sourceTable, key.sourceId))) {
        state.metrics.deletedChunks++;
      }
    }

    return dedupe([...changed, ...byKey]);
  }

  private async classify(tenantId: number, rows: SourceRow[], metrics: IndexingMetrics): Promise<ChunkInput[]> {
    const states = await this.store.getChunkStates(tenantId, rows);
    const work: ChunkInput[] = [];
    const unchanged: SourceKey[] = [];

    for (const row of rows) {
      const text = renderChunk(row);
      const stored = states.get(sourceKeyOf(row));
      const { kind, hash } = classifyChunk(stored?.chunkHash, text);

      if (kind === 'new') metrics.newChunks++;
      else if (kind === 'changed') metrics.changedChunks++;
      else metrics.unchangedChunks++;

      if (kind === 'unchanged' && stored?.hasEmbedding) {
        unchanged.push({ sourceTable: row.sourceTable, sourceId: row.sourceId });
        continue;
      }

      work.push({
        sourceTable: row.sourceTable,
        sourceId: row.sourceId,
        chunkType: row.chunkType,
        chunkText: text,
        chunkHash: hash,
      });
    }

    await this.store.touch(tenantId, unchanged);
    return work;
  }

  /**
   * Embed and store work items in batches, `concurrency` batches at a time.
   * A fatal error in one worker stops the others before their next batch.
   */
  private async embedAndStore(work: ChunkInput[], state: RunState, signal?: AbortSignal): Promise<void> {
    if (work.length === 0) return;

    const batches: ChunkInput[][] = [];
    for (let i = 0; i < work.length; i += this.batchSize) {
      batches.push(work.slice(i, i + this.batchSize));
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) forwardAbort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < batches.length) {
        throwIfAborted(controller.signal);
        const index = next++;
        try {
          await this.processBatch(batches[index], state, controller.signal);
          if (!(await this.status.heartbeat(state.tenantId, state.runId, this.now()))) {
            throw new RunSupersededError(state.tenantId);
          }
        } catch (error) {
          if (!controller.signal.aborted) controller.abort(error);
          throw error;
        }
        console.log(`[Indexer] Tenant ${state.tenantId}: batch ${index + 1}/${batches.length} done`);
      }
    };

    try {
      const workers = Array.from({ length: Math.min(this.concurrency, batches.length) }, () => worker());
      const settled = await Promise.allSettled(workers);
      const failure = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
      if (failure) throw failure.reason;
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async processBatch(batch: ChunkInput[], state: RunState, signal: AbortSignal): Promise<void> {
    let outcomes: EmbedOutcome[];
    try {
      outcomes = await this.embeddings.embedBatch(batch.map((chunk) => chunk.chunkText), { signal });
    } catch (error) {
      throwIfAborted(signal);
      console.warn(`[Indexer] Embedding batch of ${batch.length} failed: ${errorMessage(error)}`);
      const failure = error instanceof EmbeddingError ? error : new EmbeddingError(errorMessage(error), { cause: error });
      outcomes = batch.map((): EmbedOutcome => ({ ok: false, error: failure }));
    }

    for (let i = 0; i < batch.length; i++) {
      throwIfAborted(signal);
      const chunk = batch[i];
      const embedding = await this.embedWithRetry(chunk, outcomes[i], signal);

      if (embedding === null) {
        if (await this.storeWithRetry(state, chunk, signal, () => this.store.markPending(state.tenantId, chunk))) {
          state.metrics.failedChunks++;
        }
        continue;
      }

      const stored = await this.storeWithRetry(state, chunk, signal, async () => {
        await this.store.upsert(state.tenantId, chunk, embedding);
      });
      if (stored) state.metrics.embeddingsGenerated++;
    }
  }

  /**
   * The batch outcome is attempt one; failed items are re-requested alone with
   * exponential backoff. Returns null once attempts are exhausted.
   */
  private async embedWithRetry(chunk: ChunkInput, outcome: EmbedOutcome | undefined, signal: AbortSignal): Promise<number[] | null> {
    try {
      return await withRetry(
        async (attempt) => {
          if (attempt === 1 && outcome) {
            if (outcome.ok) return outcome.embedding;
            throw outcome.error;
          }
          return this.embeddings.embed(chunk.chunkText, { signal });
        },
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.retryBaseDelayMs,
          signal,
          isRetryable: (error) => this.embeddings.isRetryable(error),
          onRetry: (error, attempt, delayMs) =>
            console.warn(
              `[Indexer] Embedding ${sourceKeyOf(chunk)} failed (attempt ${attempt}/${this.maxAttempts}), ` +
                `retrying in ${delayMs}ms: ${errorMessage(error)}`
            ),
        },
      );
    } catch (error) {
      throwIfAborted(signal);
      console.warn(`[Indexer] Leaving ${sourceKeyOf(chunk)} pending: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Run a store write with retries. An exhausted write puts the row in the retry
   * set and counts towards the consecutive-failure limit; reaching it, or losing
   * the connection, aborts the run.
   */
  private async storeWithRetry(
    state: RunState,
    chunk: ChunkInput,
    signal: AbortSignal,
    write: () => Promise<void>,
  ): Promise<boolean> {
    try {
      await withRetry(() => write(), {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.retryBaseDelayMs,
        signal,
        onRetry: (error, attempt, delayMs) =>
          console.warn(
            `[Indexer] Storing ${sourceKeyOf(chunk)} failed (attempt ${attempt}/${this.maxAttempts}), ` +
              `retrying in ${delayMs}ms: ${errorMessage(error)}`
          ),
      });
      state.consecutiveStoreFailures = 0;
      return true;
    } catch (error) {
      throwIfAborted(signal);
      state.consecutiveStoreFailures++;
      state.metrics.failedWrites++;
      state.retryKeys.push({ sourceTable: chunk.sourceTable, sourceId: chunk.sourceId });
      state.errors.push(`${sourceKeyOf(chunk)}: ${errorMessage(error)}`);

      const connectivity = error instanceof VectorStoreError && error.connectivity;
      if (connectivity || state.consecutiveStoreFailures >= this.maxConsecutiveStoreFailures) {
        throw new VectorStoreError(
          `Vector store unavailable after ${state.consecutiveStoreFailures} consecutive failed writes: ${errorMessage(error)}`,
          true,
          { cause: error },
        );
      }
      return false;
    }
  }

  /** Delete every stored chunk whose source row was not extracted. */
  private async reconcile(tenantId: number, rows: SourceRow[], metrics: IndexingMetrics): Promise<void> {
    const seen = new Set(rows.map(sourceKeyOf));
    for (const key of await this.store.listSourceKeys(tenantId)) {
      if (!seen.has(sourceKeyOf(key)) && (await this.store.delete(tenantId, key.sourceTable, key.sourceId))) {
        metrics.deletedChunks++;
      }
    }
  }

  private result(
    tenantId: number,
    status: IndexingResult['status'],
    mode: IndexingMode,
    totalChunks: number,
    metrics: IndexingMetrics,
    errors: string[],
    startedAt: Date,
  ): IndexingResult {
    return {
      tenantId,
      status,
      mode,
      totalChunks,
      metrics,
      errors,
      durationMs: this.now().getTime() - startedAt.getTime(),
    };
  }
}

function dedupe(rows: SourceRow[]): SourceRow[] {
  const byKey = new Map<string, SourceRow>();
  for (const row of rows) byKey.set(sourceKeyOf(row), row);
  return [...byKey.values()];
}

function dedupeKeys(keys: SourceKey[]): SourceKey[] {
  const byKey = new Map<string, SourceKey>();
  for (const key of keys) byKey.set(sourceKeyOf(key), key);
  return [...byKey.values()];
}
