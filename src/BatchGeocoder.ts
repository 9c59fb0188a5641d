import type { BatchClientConfig } from './application/BatchClientConfig.js';
import type { ResultColumns } from './domain/model/ResultColumns.js';
import type { GeocodeSummary } from './domain/model/GeocodeJob.js';
import type { WorkbookStore } from './domain/ports/WorkbookStore.js';
import type { Clock } from './domain/ports/Clock.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import type { JobStatusResult } from './application/usecases/GetJobStatus.js';
import type { BatchGeocodeClient } from './application/BatchGeocodeClient.js';
import { DEFAULT_RESULT_COLUMNS } from './domain/model/ResultColumns.js';
import { GeocodeJobContext } from './application/GeocodeJobContext.js';
import { RunGeocodeJob } from './application/usecases/RunGeocodeJob.js';
import { GetJobStatus } from './application/usecases/GetJobStatus.js';
import { SystemClock } from './infrastructure/clock/SystemClock.js';

export interface BatchGeocoderConfig {
  readonly client: BatchClientConfig;
  readonly columns?: ResultColumns;
  /** Time source for polling and elapsed counters. Default: wall clock. */
  readonly clock?: Clock;
  /** Pre-built client, mainly for tests. Default: built from `client`. */
  readonly batchClient?: BatchGeocodeClient;
}

/**
 * Facade for one geocoding run over one sheet.
 *
 * ```ts
 * const summary = await new BatchGeocoder({ client })
 *   .from(new XlsxWorkbook('Locations.xlsx', { sheetName: 'Locations' }))
 *   .on('batch:completed', (e) => console.log(e.batchIndex))
 *   .run();
 * ```
 */
export class BatchGeocoder {
  private readonly ctx: GeocodeJobContext;
  private readonly runJob: RunGeocodeJob;
  private readonly getJobStatus: GetJobStatus;

  constructor(config: BatchGeocoderConfig) {
    this.ctx = new GeocodeJobContext(
      config.client,
      config.columns ?? DEFAULT_RESULT_COLUMNS,
      config.clock ?? new SystemClock(),
      config.batchClient,
    );
    this.runJob = new RunGeocodeJob(this.ctx);
    this.getJobStatus = new GetJobStatus(this.ctx);
  }

  from(store: WorkbookStore): this {
    this.ctx.store = store;
    return this;
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Geocode, merge and write back. Rejects with the first failure; the document is untouched then. */
  run(): Promise<GeocodeSummary> {
    return this.runJob.execute();
  }

  getStatus(): JobStatusResult {
    return this.getJobStatus.execute();
  }

  getJobId(): string {
    return this.getJobStatus.getJobId();
  }
}
