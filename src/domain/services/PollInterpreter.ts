/** Provider states that mean the job is still being worked on. */
export const RUNNING_STATES: readonly string[] = ['Running', 'Pending', 'InProgress'];
export const SUCCEEDED_STATES: readonly string[] = ['Succeeded', 'Completed'];
export const FAILED_STATES: readonly string[] = ['Failed', 'Error'];

/** HTTP status the provider answers while the batch job is still running. */
export const ACCEPTED_STATUS = 202;

export interface PollTiming {
  /** Minimum sleep between ticks. */
  readonly pollFloorMs: number;
  /** Upper bound on a single sleep, however large the Retry-After hint. */
  readonly pollMaxSleepMs: number;
  /** Sleep after an unparsable body or an unknown state. */
  readonly transientRetryMs: number;
}

export interface PollResponse {
  readonly status: number;
  readonly retryAfter: string | null;
  readonly bodyText: string;
}

/** What the poll loop should do with one response. */
export type PollDecision =
  | { readonly kind: 'ready'; readonly body: unknown; readonly detail: string }
  | { readonly kind: 'wait'; readonly sleepMs: number; readonly detail: string }
  | { readonly kind: 'retry'; readonly sleepMs: number; readonly detail: string }
  | { readonly kind: 'failed'; readonly body: unknown; readonly detail: string }
  | { readonly kind: 'error'; readonly status: number; readonly detail: string };

/** Sleep honoring a numeric `Retry-After` (seconds), floored and capped. */
export function computePollDelay(retryAfter: string | null, timing: PollTiming): number {
  const hint = retryAfter !== null && /^\d+$/.test(retryAfter.trim()) ? Number(retryAfter.trim()) * 1000 : 0;
  return Math.min(Math.max(timing.pollFloorMs, hint), timing.pollMaxSleepMs);
}

/** First non-empty string found along the ordered `paths` of `body`. */
export function readState(body: unknown, paths: readonly (readonly string[])[]): string | null {
  for (const path of paths) {
    let current: unknown = body;
    for (const key of path) {
      current = isObject(current) ? current[key] : undefined;
    }
    if (typeof current === 'string' && current !== '') return current;
  }
  return null;
}

/**
 * Classify one poll response.
 *
 * Embedded `batchItems` means ready whatever the state field says; otherwise
 * the state found along `statePaths` decides. Unparsable bodies and unknown
 * states are transient.
 */
export function interpretPollResponse(
  response: PollResponse,
  timing: PollTiming,
  statePaths: readonly (readonly string[])[],
): PollDecision {
  if (response.status === ACCEPTED_STATUS) {
    return { kind: 'wait', sleepMs: computePollDelay(response.retryAfter, timing), detail: 'HTTP 202' };
  }

  if (response.status < 200 || response.status >= 300) {
    return { kind: 'error', status: response.status, detail: `HTTP ${String(response.status)}` };
  }

  let body: unknown;
  try {
    body = JSON.parse(response.bodyText);
  } catch {
    return { kind: 'retry', sleepMs: timing.transientRetryMs, detail: 'non-JSON response' };
  }

  if (isObject(body) && 'batchItems' in body) {
    return { kind: 'ready', body, detail: 'batchItems present' };
  }

  const state = readState(body, statePaths);

  if (state !== null && RUNNING_STATES.includes(state)) {
    return { kind: 'wait', sleepMs: computePollDelay(response.retryAfter, timing), detail: state };
  }
  if (state !== null && SUCCEEDED_STATES.includes(state)) {
    return { kind: 'ready', body, detail: state };
  }
  if (state !== null && FAILED_STATES.includes(state)) {
    return { kind: 'failed', body, detail: state };
  }

  return { kind: 'retry', sleepMs: timing.transientRetryMs, detail: `unknown state ${state ?? '(none)'}` };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
