// Main entry point
export { BatchGeocoder } from './BatchGeocoder.js';
export type { BatchGeocoderConfig } from './BatchGeocoder.js';

// Batch client
export { BatchGeocodeClient } from './application/BatchGeocodeClient.js';
export type { BatchHooks, BatchClientDeps, PollTick } from './application/BatchGeocodeClient.js';
export { DEFAULT_CLIENT_CONFIG } from './application/BatchClientConfig.js';
export type { BatchClientConfig } from './application/BatchClientConfig.js';
export type { JobStatusResult } from './application/usecases/GetJobStatus.js';
export { EventBus } from './application/EventBus.js';

// Domain model
export type { CellValue, Row, Table } from './domain/model/Row.js';
export { isEmptyCell, cellText } from './domain/model/Row.js';
export type { ResultColumns } from './domain/model/ResultColumns.js';
export { DEFAULT_RESULT_COLUMNS, resultColumnNames } from './domain/model/ResultColumns.js';
export type { GeocodeRequest } from './domain/model/GeocodeRequest.js';
export { buildGeocodeRequests } from './domain/model/GeocodeRequest.js';
export type { BatchResult, ResultAssociation } from './domain/model/BatchResult.js';
export { NO_MATCH_STATUS, MATCHED_STATUS, noMatchResult } from './domain/model/BatchResult.js';
export type { Batch } from './domain/model/Batch.js';
export type { GeocodeProgress, GeocodeSummary } from './domain/model/GeocodeJob.js';
export { PollState } from './domain/model/PollState.js';
export { JobStatus } from './domain/model/JobStatus.js';

// Errors
export {
  GeocodeError,
  ConfigError,
  SchemaError,
  TransportError,
  MissingContinuationError,
  PollTimeoutError,
  BatchFailedError,
  ResultCountMismatchError,
  isGeocodeError,
} from './domain/errors/GeocodeErrors.js';
export type { GeocodeErrorCode } from './domain/errors/GeocodeErrors.js';

// Domain services
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export { prepareRows } from './domain/services/RowSource.js';
export type { PreparedRows } from './domain/services/RowSource.js';
export { mergeResults } from './domain/services/ResultMerger.js';
export { parseBatchResults } from './domain/services/ResultParser.js';
export { findContinuationUrl, mergeQueryParams } from './domain/services/ContinuationUrl.js';
export { interpretPollResponse, computePollDelay } from './domain/services/PollInterpreter.js';
export type { PollDecision, PollResponse, PollTiming } from './domain/services/PollInterpreter.js';

// Ports (for custom implementations)
export type { WorkbookStore } from './domain/ports/WorkbookStore.js';
export type { Clock } from './domain/ports/Clock.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  JobStartedEvent,
  JobCompletedEvent,
  JobFailedEvent,
  JobProgressEvent,
  BatchSubmittedEvent,
  BatchPolledEvent,
  BatchCompletedEvent,
  BatchFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { XlsxWorkbook } from './infrastructure/workbooks/XlsxWorkbook.js';
export type { XlsxWorkbookOptions } from './infrastructure/workbooks/XlsxWorkbook.js';
export { CsvWorkbook } from './infrastructure/workbooks/CsvWorkbook.js';
export type { CsvWorkbookOptions } from './infrastructure/workbooks/CsvWorkbook.js';
export { backupFile, backupPathFor } from './infrastructure/workbooks/backupFile.js';
export { SystemClock } from './infrastructure/clock/SystemClock.js';
export { loadConfig, CREDENTIAL_ENV, DEFAULT_SHEET_NAME } from './infrastructure/config/loadConfig.js';
export type { GeocoderConfig, ConfigOverrides } from './infrastructure/config/loadConfig.js';
export { createLogger } from './infrastructure/logging/logger.js';
export type { Logger } from './infrastructure/logging/logger.js';
