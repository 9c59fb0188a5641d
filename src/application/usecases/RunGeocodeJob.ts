import type { GeocodeSummary } from '../../domain/model/GeocodeJob.js';
import type { GeocodeJobContext } from '../GeocodeJobContext.js';
import { prepareRows } from '../../domain/services/RowSource.js';
import { mergeResults } from '../../domain/services/ResultMerger.js';
import { isGeocodeError } from '../../domain/errors/GeocodeErrors.js';
import { GeocodeRows } from './GeocodeRows.js';

/**
 * Use case: load the sheet, geocode its eligible rows, merge and write back.
 *
 * The backup is taken and the sheet written only after every batch has
 * succeeded, so a failed run leaves the document as it was.
 */
export class RunGeocodeJob {
  constructor(private readonly ctx: GeocodeJobContext) {}

  async execute(): Promise<GeocodeSummary> {
    const store = this.ctx.assertStoreConfigured();
    if (this.ctx.status !== 'CREATED') {
      throw new Error(`Cannot run geocoding job from status '${this.ctx.status}'`);
    }

    this.ctx.transitionTo('RUNNING');
    this.ctx.startedAt = this.ctx.clock.now();

    try {
      const { table, eligible } = prepareRows(await store.read(), this.ctx.columns);
      this.ctx.totalRows = table.rows.length;
      this.ctx.eligibleRows = eligible.length;

      this.ctx.eventBus.emit({
        type: 'job:started',
        jobId: this.ctx.jobId,
        totalRows: table.rows.length,
        eligibleRows: eligible.length,
        totalBatches: Math.ceil(eligible.length / this.ctx.clientConfig.batchSize),
        timestamp: Date.now(),
      });

      let backupPath: string | undefined;
      if (eligible.length > 0) {
        const associations = await new GeocodeRows(this.ctx).execute(eligible);
        const merged = mergeResults(table, associations, this.ctx.columns);

        backupPath = await store.backup();
        await store.write(merged);
      }

      this.ctx.transitionTo('COMPLETED');
      const summary = this.ctx.buildSummary(backupPath);
      this.ctx.eventBus.emit({
        type: 'job:completed',
        jobId: this.ctx.jobId,
        summary,
        timestamp: Date.now(),
      });
      return summary;
    } catch (error) {
      this.ctx.transitionTo('FAILED');
      this.ctx.eventBus.emit({
        type: 'job:failed',
        jobId: this.ctx.jobId,
        error: error instanceof Error ? error.message : String(error),
        ...(isGeocodeError(error) ? { code: error.code } : {}),
        timestamp: Date.now(),
      });
      throw error;
    }
  }
}
