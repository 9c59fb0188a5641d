import { randomUUID } from 'node:crypto';
import type { Row } from '../../domain/model/Row.js';
import type { ResultAssociation } from '../../domain/model/BatchResult.js';
import type { GeocodeJobContext } from '../GeocodeJobContext.js';
import { createBatch } from '../../domain/model/Batch.js';
import { isMatched } from '../../domain/model/BatchResult.js';
import { buildGeocodeRequests } from '../../domain/model/GeocodeRequest.js';
import { BatchSplitter } from '../../domain/services/BatchSplitter.js';
import { PollTimeoutError, ResultCountMismatchError } from '../../domain/errors/GeocodeErrors.js';

/**
 * Use case: geocode eligible rows batch by batch, in order.
 *
 * Returns one association per eligible row, in the order given. The first
 * failing batch aborts the run and nothing accumulated so far is returned.
 */
export class GeocodeRows {
  constructor(private readonly ctx: GeocodeJobContext) {}

  async execute(eligible: readonly Row[]): Promise<ResultAssociation[]> {
    const splitter = new BatchSplitter(this.ctx.clientConfig.batchSize);
    const totalBatches = splitter.countBatches(eligible.length);
    const associations: ResultAssociation[] = [];

    for await (const { rows, batchIndex } of splitter.split(eligible)) {
      associations.push(...(await this.processBatch(rows, batchIndex, totalBatches)));
    }

    return associations;
  }

  private async processBatch(
    rows: readonly Row[],
    batchIndex: number,
    totalBatches: number,
  ): Promise<ResultAssociation[]> {
    const batchId = randomUUID();
    this.ctx.batches.push(createBatch(batchId, batchIndex, rows));
    const requests = buildGeocodeRequests(rows, this.ctx.columns.address, this.ctx.clientConfig.countrySet);

    try {
      const results = await this.ctx.client.geocodeBatch(requests, {
        onSubmitted: (continuationUrl) => {
          this.ctx.updateBatch(batchId, { status: 'POLLING', continuationUrl });
          this.ctx.eventBus.emit({
            type: 'batch:submitted',
            jobId: this.ctx.jobId,
            batchId,
            batchIndex,
            totalBatches,
            rowCount: rows.length,
            timestamp: Date.now(),
          });
        },
        onPoll: (tick) => {
          this.ctx.eventBus.emit({
            type: 'batch:polled',
            jobId: this.ctx.jobId,
            batchId,
            batchIndex,
            state: tick.state,
            detail: tick.detail,
            sleepMs: tick.sleepMs,
            timestamp: Date.now(),
          });
        },
      });

      const associations = rows.map((row, position) => {
        const result = results[position];
        if (!result) {
          throw new ResultCountMismatchError(rows.length, results.length, batchIndex);
        }
        return { rowId: row.rowId, result };
      });
      const matchedCount = results.filter(isMatched).length;

      this.ctx.geocodedRows += rows.length;
      this.ctx.matchedRows += matchedCount;
      this.ctx.updateBatch(batchId, { status: 'READY', matchedCount });
      this.ctx.releaseBatchRows(batchId);

      this.ctx.eventBus.emit({
        type: 'batch:completed',
        jobId: this.ctx.jobId,
        batchId,
        batchIndex,
        totalBatches,
        rowCount: rows.length,
        matchedCount,
        timestamp: Date.now(),
      });
      this.ctx.eventBus.emit({
        type: 'job:progress',
        jobId: this.ctx.jobId,
        progress: this.ctx.buildProgress(),
        timestamp: Date.now(),
      });

      return associations;
    } catch (error) {
      this.ctx.updateBatch(batchId, { status: error instanceof PollTimeoutError ? 'TIMED_OUT' : 'FAILED' });
      this.ctx.eventBus.emit({
        type: 'batch:failed',
        jobId: this.ctx.jobId,
        batchId,
        batchIndex,
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      throw error;
    }
  }
}
