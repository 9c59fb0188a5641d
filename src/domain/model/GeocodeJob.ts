/** Real-time counters for an in-flight run. */
export interface GeocodeProgress {
  readonly eligibleRows: number;
  readonly geocodedRows: number;
  /** Completion percentage (0–100). */
  readonly percentage: number;
  readonly completedBatches: number;
  readonly totalBatches: number;
  readonly elapsedMs: number;
}

/** Final summary returned by `run()` and carried by `job:completed`. */
export interface GeocodeSummary {
  readonly totalRows: number;
  readonly eligibleRows: number;
  readonly batches: number;
  readonly matched: number;
  readonly unmatched: number;
  readonly elapsedMs: number;
  /** Path of the pre-run copy, absent when nothing was written. */
  readonly backupPath?: string;
}
