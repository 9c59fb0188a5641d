/** Maximum length of a provider payload kept on an error for diagnostics. */
export const SNAPSHOT_LIMIT = 500;

export type GeocodeErrorCode =
  | 'CONFIG_ERROR'
  | 'SCHEMA_ERROR'
  | 'TRANSPORT_ERROR'
  | 'MISSING_CONTINUATION'
  | 'POLL_TIMEOUT'
  | 'BATCH_FAILED'
  | 'RESULT_COUNT_MISMATCH';

/** Base class for every failure that aborts a geocoding run. */
export class GeocodeError extends Error {
  readonly code: GeocodeErrorCode;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(message: string, code: GeocodeErrorCode, context: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/** Missing or invalid configuration, raised before any network call. */
export class ConfigError extends GeocodeError {
  constructor(message: string, configKey?: string) {
    super(message, 'CONFIG_ERROR', { configKey });
  }
}

/** The sheet or the address column is absent. */
export class SchemaError extends GeocodeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SCHEMA_ERROR', context);
  }
}

/** HTTP-level failure: network error, timeout or an unexpected status. */
export class TransportError extends GeocodeError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, 'TRANSPORT_ERROR', { status }, options);
    this.status = status;
  }
}

/** The submit response carried none of the continuation headers. */
export class MissingContinuationError extends GeocodeError {
  constructor(headerNames: readonly string[]) {
    super(`Missing ${headerNames.join('/')} header in batch submission response`, 'MISSING_CONTINUATION', {
      headerNames,
    });
  }
}

/** The poll loop of one batch exceeded its ceiling. */
export class PollTimeoutError extends GeocodeError {
  readonly elapsedMs: number;

  constructor(reason: string, elapsedMs: number, ceilingMs: number) {
    super(`Polling timed out for batch job (${reason})`, 'POLL_TIMEOUT', { elapsedMs, ceilingMs });
    this.elapsedMs = elapsedMs;
  }
}

/** The provider reported the batch job as failed. */
export class BatchFailedError extends GeocodeError {
  /** Response body, truncated to `SNAPSHOT_LIMIT` characters. */
  readonly snapshot: string;

  constructor(body: unknown) {
    const snapshot = truncate(typeof body === 'string' ? body : JSON.stringify(body) ?? String(body));
    super(`Batch failed: ${snapshot}`, 'BATCH_FAILED', { snapshot });
    this.snapshot = snapshot;
  }
}

/** A batch returned a different number of results than requests submitted. */
export class ResultCountMismatchError extends GeocodeError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, batchIndex?: number) {
    super(
      `Result length mismatch for batch: expected ${String(expected)}, got ${String(actual)}`,
      'RESULT_COUNT_MISMATCH',
      { expected, actual, batchIndex },
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export function isGeocodeError(value: unknown): value is GeocodeError {
  return value instanceof GeocodeError;
}

export function truncate(text: string, limit = SNAPSHOT_LIMIT): string {
  return text.length > limit ? text.slice(0, limit) : text;
}
