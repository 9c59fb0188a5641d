import type { JobStatus } from '../../domain/model/JobStatus.js';
import type { GeocodeProgress } from '../../domain/model/GeocodeJob.js';
import type { Batch } from '../../domain/model/Batch.js';
import type { GeocodeJobContext } from '../GeocodeJobContext.js';

/** Result of querying job status. */
export interface JobStatusResult {
  readonly status: JobStatus;
  readonly progress: GeocodeProgress;
  readonly batches: readonly Batch[];
}

/** Use case: query the current state, progress, and batch details of a job. */
export class GetJobStatus {
  constructor(private readonly ctx: GeocodeJobContext) {}

  execute(): JobStatusResult {
    return {
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
      batches: this.ctx.batches,
    };
  }

  getJobId(): string {
    return this.ctx.jobId;
  }
}
