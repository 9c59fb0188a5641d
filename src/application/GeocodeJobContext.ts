import { randomUUID } from 'node:crypto';
import type { Batch } from '../domain/model/Batch.js';
import type { JobStatus } from '../domain/model/JobStatus.js';
import type { GeocodeProgress, GeocodeSummary } from '../domain/model/GeocodeJob.js';
import type { ResultColumns } from '../domain/model/ResultColumns.js';
import type { Clock } from '../domain/ports/Clock.js';
import type { WorkbookStore } from '../domain/ports/WorkbookStore.js';
import type { BatchClientConfig } from './BatchClientConfig.js';
import { canTransition } from '../domain/model/JobStatus.js';
import { clearBatchRows } from '../domain/model/Batch.js';
import { EventBus } from './EventBus.js';
import { BatchGeocodeClient } from './BatchGeocodeClient.js';

/**
 * Mutable state holder shared by the use cases of a single geocoding job.
 *
 * Internal: not exported from the public API. Use cases receive a reference
 * and update it as batches complete.
 */
export class GeocodeJobContext {
  readonly eventBus: EventBus;
  readonly client: BatchGeocodeClient;
  readonly clientConfig: BatchClientConfig;
  readonly columns: ResultColumns;
  readonly clock: Clock;

  store: WorkbookStore | null = null;

  jobId: string;
  status: JobStatus = 'CREATED';
  batches: Batch[] = [];
  totalRows = 0;
  eligibleRows = 0;
  geocodedRows = 0;
  matchedRows = 0;
  startedAt?: number;

  constructor(clientConfig: BatchClientConfig, columns: ResultColumns, clock: Clock, client?: BatchGeocodeClient) {
    this.clientConfig = clientConfig;
    this.columns = columns;
    this.clock = clock;
    this.client = client ?? new BatchGeocodeClient(clientConfig, { clock });
    this.eventBus = new EventBus();
    this.jobId = randomUUID();
  }

  transitionTo(newStatus: JobStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  buildProgress(): GeocodeProgress {
    const completedBatches = this.batches.filter((b) => b.status === 'READY').length;

    return {
      eligibleRows: this.eligibleRows,
      geocodedRows: this.geocodedRows,
      percentage: this.eligibleRows > 0 ? Math.round((this.geocodedRows / this.eligibleRows) * 100) : 0,
      completedBatches,
      totalBatches: Math.ceil(this.eligibleRows / this.clientConfig.batchSize),
      elapsedMs: this.elapsedMs(),
    };
  }

  buildSummary(backupPath?: string): GeocodeSummary {
    return {
      totalRows: this.totalRows,
      eligibleRows: this.eligibleRows,
      batches: this.batches.length,
      matched: this.matchedRows,
      unmatched: this.geocodedRows - this.matchedRows,
      elapsedMs: this.elapsedMs(),
      ...(backupPath !== undefined ? { backupPath } : {}),
    };
  }

  assertStoreConfigured(): WorkbookStore {
    if (!this.store) {
      throw new Error('Workbook must be configured. Call .from(store) first.');
    }
    return this.store;
  }

  updateBatch(batchId: string, changes: Partial<Pick<Batch, 'status' | 'matchedCount' | 'continuationUrl'>>): void {
    const pos = this.batches.findIndex((b) => b.id === batchId);
    const batch = this.batches[pos];
    if (!batch) return;
    this.batches[pos] = { ...batch, ...changes };
  }

  /** Drop a finished batch's rows; its results already live in the accumulated list. */
  releaseBatchRows(batchId: string): void {
    const pos = this.batches.findIndex((b) => b.id === batchId);
    const batch = this.batches[pos];
    if (!batch) return;
    this.batches[pos] = clearBatchRows(batch);
  }

  private elapsedMs(): number {
    return this.startedAt !== undefined ? this.clock.now() - this.startedAt : 0;
  }
}
