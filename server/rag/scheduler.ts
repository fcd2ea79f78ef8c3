// ABOUTME: Periodic trigger that enqueues an indexing job for every known tenant.
// ABOUTME: Tenants whose last full index is older than the rebuild interval get a full run instead.
import { errorMessage } from './errors.js';
import type { EnqueueAck, EnqueueRequest } from './index-queue.js';
import type { SourceReader } from './source/index.js';
import type { IndexStatusTracker } from './status/index.js';

export interface IndexSchedulerOptions {
  queue: { enqueue(tenantId: number, request?: EnqueueRequest): EnqueueAck };
  source: Pick<SourceReader, 'listTenants'>;
  status: Pick<IndexStatusTracker, 'get'>;
  intervalMs: number;
  fullRebuildIntervalMs: number;
  now?: () => Date;
}

export interface TickSummary {
  tenants: number;
  full: number;
  incremental: number;
}

export class IndexScheduler {
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;
  private now: () => Date;

  constructor(private options: IndexSchedulerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) return;

    console.log(`[Scheduler] Indexing every ${Math.round(this.options.intervalMs / 60_000)} min`);
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        console.error(`[Scheduler] Tick failed: ${errorMessage(error)}`);
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Enqueue one job per tenant. Overlapping ticks are skipped. */
  async tick(): Promise<TickSummary> {
    const summary: TickSummary = { tenants: 0, full: 0, incremental: 0 };
    if (this.ticking) return summary;
    this.ticking = true;

    try {
      const tenants = await this.options.source.listTenants();
      const now = this.now().getTime();

      for (const tenantId of tenants) {
        const status = await this.options.status.get(tenantId);
        const lastFull = status?.lastFullIndexAt?.getTime();
        const fullRebuild = lastFull === undefined || now - lastFull >= this.options.fullRebuildIntervalMs;

        this.options.queue.enqueue(tenantId, { fullRebuild });
        summary.tenants++;
        if (fullRebuild) summary.full++;
        else summary.incremental++;
      }

      console.log(
        `[Scheduler] Enqueued ${summary.tenants} tenant(s): ${summary.full} full, ${summary.incremental} incremental`
      );
      return summary;
    } finally {
      this.ticking = false;
    }
  }
}
