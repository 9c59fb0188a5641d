import type { GeocodeProgress, GeocodeSummary } from '../model/GeocodeJob.js';
import type { PollState } from '../model/PollState.js';

/** Emitted when `run()` starts, after the rows have been loaded. */
export interface JobStartedEvent {
  readonly type: 'job:started';
  readonly jobId: string;
  readonly totalRows: number;
  readonly eligibleRows: number;
  readonly totalBatches: number;
  readonly timestamp: number;
}

/** Emitted once the merged table has been written (or nothing needed geocoding). */
export interface JobCompletedEvent {
  readonly type: 'job:completed';
  readonly jobId: string;
  readonly summary: GeocodeSummary;
  readonly timestamp: number;
}

/** Emitted when the run aborts. The original document is left untouched. */
export interface JobFailedEvent {
  readonly type: 'job:failed';
  readonly jobId: string;
  readonly error: string;
  readonly code?: string;
  readonly timestamp: number;
}

/** Emitted after each batch completes with updated counters. */
export interface JobProgressEvent {
  readonly type: 'job:progress';
  readonly jobId: string;
  readonly progress: GeocodeProgress;
  readonly timestamp: number;
}

/** Emitted when the provider accepted a batch and returned a continuation URL. */
export interface BatchSubmittedEvent {
  readonly type: 'batch:submitted';
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly totalBatches: number;
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Emitted for every poll tick that did not end the poll loop. */
export interface BatchPolledEvent {
  readonly type: 'batch:polled';
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly state: PollState;
  /** Provider state label or HTTP status that drove the decision. */
  readonly detail: string;
  readonly sleepMs: number;
  readonly timestamp: number;
}

/** Emitted when a batch's results have been parsed and accumulated. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly totalBatches: number;
  readonly rowCount: number;
  readonly matchedCount: number;
  readonly timestamp: number;
}

/** Emitted when a batch fails; the whole run fails with it. */
export interface BatchFailedEvent {
  readonly type: 'batch:failed';
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | JobStartedEvent
  | JobCompletedEvent
  | JobFailedEvent
  | JobProgressEvent
  | BatchSubmittedEvent
  | BatchPolledEvent
  | BatchCompletedEvent
  | BatchFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
