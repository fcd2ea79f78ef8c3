// ABOUTME: In-process work queue that runs indexing jobs with bounded concurrency across tenants.
// ABOUTME: One pending and one running job per tenant; a full rebuild supersedes a running incremental run.
import { RunSupersededError, errorMessage } from './errors.js';
import type { IndexingResult, RunOptions } from './indexer.js';
import { sourceKeyOf, type IndexingMode, type SourceKey } from './types.js';

export interface IndexRunner {
  run(tenantId: number, options: RunOptions): Promise<IndexingResult>;
}

export interface EnqueueRequest {
  fullRebuild?: boolean;
  changedKeys?: SourceKey[];
}

export interface EnqueueAck {
  /** `coalesced` when the request merged into a job already waiting for the tenant. */
  status: 'queued' | 'coalesced';
  tenantId: number;
  mode: IndexingMode;
}

interface Job {
  tenantId: number;
  fullRebuild: boolean;
  changedKeys: Map<string, SourceKey>;
}

interface RunningJob {
  job: Job;
  controller: AbortController;
}

export interface IndexingQueueOptions {
  concurrency?: number;
  onResult?: (result: IndexingResult) => void;
}

export class IndexingQueue {
  private pending = new Map<number, Job>();
  private running = new Map<number, RunningJob>();
  private active = new Set<Promise<void>>();
  private concurrency: number;
  private onResult?: (result: IndexingResult) => void;

  constructor(private runner: IndexRunner, options: IndexingQueueOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? 2);
    this.onResult = options.onResult;
  }

  enqueue(tenantId: number, request: EnqueueRequest = {}): EnqueueAck {
    const fullRebuild = request.fullRebuild ?? false;
    let job = this.pending.get(tenantId);
    const status = job ? 'coalesced' : 'queued';

    if (!job) {
      job = { tenantId, fullRebuild: false, changedKeys: new Map() };
      this.pending.set(tenantId, job);
    }
    job.fullRebuild = job.fullRebuild || fullRebuild;
    for (const key of request.changedKeys ?? []) {
      job.changedKeys.set(sourceKeyOf(key), key);
    }

    const current = this.running.get(tenantId);
    if (fullRebuild && current && !current.job.fullRebuild && !current.controller.signal.aborted) {
      console.log(`[IndexQueue] Full rebuild for tenant ${tenantId} supersedes the running incremental run`);
      current.controller.abort(new RunSupersededError(tenantId));
    }

    this.pump();
    return { status, tenantId, mode: job.fullRebuild ? 'full' : 'incremental' };
  }

  stats(): { pending: number; running: number } {
    return { pending: this.pending.size, running: this.running.size };
  }

  isBusy(tenantId: number): boolean {
    return this.pending.has(tenantId) || this.running.has(tenantId);
  }

  /** Resolve once nothing is pending or running. */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active]);
    }
  }

  /** Drop pending jobs, cancel running ones and wait for them to settle. */
  async shutdown(): Promise<void> {
    this.pending.clear();
    for (const { job, controller } of this.running.values()) {
      controller.abort(new RunSupersededError(job.tenantId));
    }
    await this.drain();
  }

  private pump(): void {
    for (const [tenantId, job] of this.pending) {
      if (this.running.size >= this.concurrency) return;
      if (this.running.has(tenantId)) continue;

      this.pending.delete(tenantId);
      this.start(job);
    }
  }

  private start(job: Job): void {
    const controller = new AbortController();
    this.running.set(job.tenantId, { job, controller });

    const task = this.execute(job, controller.signal).finally(() => {
      this.running.delete(job.tenantId);
      this.active.delete(task);
      this.pump();
    });
    this.active.add(task);
  }

  private async execute(job: Job, signal: AbortSignal): Promise<void> {
    const mode = job.fullRebuild ? 'full' : 'incremental';
    console.log(`[IndexQueue] Running ${mode} job for tenant ${job.tenantId} (${this.running.size} running)`);

    try {
      const result = await this.runner.run(job.tenantId, {
        fullRebuild: job.fullRebuild,
        changedKeys: job.changedKeys.size > 0 ? [...job.changedKeys.values()] : undefined,
        signal,
      });
      this.onResult?.(result);
    } catch (error) {
      console.error(`[IndexQueue] Job for tenant ${job.tenantId} failed: ${errorMessage(error)}`);
    }
  }
}
