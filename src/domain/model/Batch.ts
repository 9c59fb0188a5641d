import type { PollState } from './PollState.js';
import type { Row } from './Row.js';

/** A contiguous slice of eligible rows submitted as one provider job. */
export interface Batch {
  /** Unique batch identifier (UUID). */
  readonly id: string;
  /** Zero-based batch index within the run. */
  readonly index: number;
  /** Poll state of the provider job, `SUBMITTED` until the first tick. */
  readonly status: PollState;
  /** Rows in this batch. Cleared once their results are accumulated. */
  readonly rows: readonly Row[];
  /** Number of rows submitted. Kept after `rows` is cleared. */
  readonly rowCount: number;
  /** Number of results that came back with a match. */
  readonly matchedCount: number;
  /** Continuation URL returned on submission. */
  readonly continuationUrl?: string;
}

export function createBatch(id: string, index: number, rows: readonly Row[]): Batch {
  return {
    id,
    index,
    status: 'SUBMITTED',
    rows,
    rowCount: rows.length,
    matchedCount: 0,
  };
}

export function clearBatchRows(batch: Batch): Batch {
  return { ...batch, rows: [] };
}
