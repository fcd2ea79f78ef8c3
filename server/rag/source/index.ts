// ABOUTME: Read-only view of a tenant's business tables, as typed SourceRows.
// ABOUTME: The indexer depends on this contract only; Drizzle and in-memory readers implement it.
import type { SourceKey, SourceRow } from '../types.js';

export interface SourceReader {
  /** Every tenant that owns at least one source row. */
  listTenants(): Promise<number[]>;

  selectAll(tenantId: number): Promise<SourceRow[]>;

  /**
   * Rows updated after `since`, plus rows whose referenced product was,
   * since the product name is rendered into their chunk.
   */
  selectChanged(tenantId: number, since: Date): Promise<SourceRow[]>;

  /** Rows by key; keys that no longer exist are skipped. */
  selectByKeys(tenantId: number, keys: SourceKey[]): Promise<SourceRow[]>;
}
