import type { BatchClientConfig } from './BatchClientConfig.js';
import type { Clock } from '../domain/ports/Clock.js';
import type { GeocodeRequest } from '../domain/model/GeocodeRequest.js';
import type { BatchResult } from '../domain/model/BatchResult.js';
import type { PollTiming } from '../domain/services/PollInterpreter.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import { PollState, canTransition } from '../domain/model/PollState.js';
import { interpretPollResponse } from '../domain/services/PollInterpreter.js';
import { findContinuationUrl, mergeQueryParams } from '../domain/services/ContinuationUrl.js';
import { parseBatchResults } from '../domain/services/ResultParser.js';
import {
  BatchFailedError,
  ConfigError,
  MissingContinuationError,
  PollTimeoutError,
  ResultCountMismatchError,
  TransportError,
  truncate,
} from '../domain/errors/GeocodeErrors.js';
import { fetchWithTimeout, redact } from '../infrastructure/http/fetchWithTimeout.js';
import { SystemClock } from '../infrastructure/clock/SystemClock.js';
import { createLogger } from '../infrastructure/logging/logger.js';

/** One poll tick that did not end the loop. */
export interface PollTick {
  readonly state: PollState;
  readonly detail: string;
  readonly sleepMs: number;
}

/** Callbacks fired while a batch moves through submit and poll. */
export interface BatchHooks {
  onSubmitted?(continuationUrl: string): void;
  onPoll?(tick: PollTick): void;
}

export interface BatchClientDeps {
  readonly clock?: Clock;
  readonly logger?: Logger;
}

/**
 * Client for the provider's asynchronous batch contract.
 *
 * `submit()` posts the requests and returns the continuation URL, `poll()`
 * waits for the job to finish, and `geocodeBatch()` chains both and parses
 * the best match per request. Calls are sequential; nothing here runs two
 * requests at once.
 */
export class BatchGeocodeClient {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly timing: PollTiming;

  constructor(
    private readonly config: BatchClientConfig,
    deps: BatchClientDeps = {},
  ) {
    if (config.credential.trim() === '') {
      throw new ConfigError('Batch client credential is not set.', 'credential');
    }
    this.clock = deps.clock ?? new SystemClock();
    this.logger = deps.logger ?? createLogger('batch-client');
    this.timing = {
      pollFloorMs: config.pollFloorMs,
      pollMaxSleepMs: config.pollMaxSleepMs,
      transientRetryMs: config.transientRetryMs,
    };
  }

  /** Submit, poll to completion and return one result per request, in request order. */
  async geocodeBatch(requests: readonly GeocodeRequest[], hooks: BatchHooks = {}): Promise<BatchResult[]> {
    const continuationUrl = await this.submit(requests);
    hooks.onSubmitted?.(continuationUrl);

    const body = await this.poll(continuationUrl, hooks.onPoll);
    const results = parseBatchResults(body);

    if (results.length !== requests.length) {
      throw new ResultCountMismatchError(requests.length, results.length);
    }
    return results;
  }

  /** POST the requests; returns the absolute continuation URL. */
  async submit(requests: readonly GeocodeRequest[]): Promise<string> {
    const url = mergeQueryParams(this.config.endpoint, this.authParams());

    const response = await fetchWithTimeout(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ batchItems: requests }),
      timeout: this.config.requestTimeoutMs,
    });
    const bodyText = await response.text();

    // Any 2xx counts as accepted; the provider answers 202. The continuation header is required either way.
    if (!response.ok) {
      throw new TransportError(
        `Batch submission failed with HTTP ${String(response.status)}: ${truncate(bodyText)}`,
        response.status,
      );
    }

    const location = findContinuationUrl(response.headers, this.config.continuationHeaders);
    if (!location) {
      throw new MissingContinuationError(this.config.continuationHeaders);
    }

    const continuationUrl = new URL(location, this.config.endpoint).toString();
    this.logger.info(`Submitted ${String(requests.length)} request(s)`, {
      status: response.status,
      continuation: redact(continuationUrl),
    });
    return continuationUrl;
  }

  /**
   * Poll `continuationUrl` until the job is ready and return the parsed body.
   *
   * Throws `BatchFailedError` when the provider reports failure,
   * `TransportError` on an error status, and `PollTimeoutError` once the
   * time spent polling passes `pollCeilingMs`.
   */
  async poll(continuationUrl: string, onPoll?: (tick: PollTick) => void): Promise<unknown> {
    const pollUrl = mergeQueryParams(continuationUrl, this.authParams(), this.config.endpoint);
    const startedAt = this.clock.now();
    let state: PollState = advance(PollState.SUBMITTED, PollState.POLLING);

    for (;;) {
      const response = await fetchWithTimeout(pollUrl, { method: 'GET', timeout: this.config.requestTimeoutMs });
      const bodyText = await response.text();
      const decision = interpretPollResponse(
        { status: response.status, retryAfter: response.headers.get('Retry-After'), bodyText },
        this.timing,
        this.config.stateFields,
      );

      switch (decision.kind) {
        case 'ready':
          state = advance(state, PollState.READY);
          this.logger.info(`Batch results available (${decision.detail})`);
          return decision.body;

        case 'failed':
          state = advance(state, PollState.FAILED);
          throw new BatchFailedError(decision.body);

        case 'error':
          state = advance(state, PollState.FAILED);
          throw new TransportError(
            `Batch poll failed with HTTP ${String(decision.status)}: ${truncate(bodyText)}`,
            decision.status,
          );

        case 'wait':
        case 'retry': {
          this.logger.debug(`Batch state: ${decision.detail}. Sleeping ${String(decision.sleepMs)}ms`);
          onPoll?.({ state, detail: decision.detail, sleepMs: decision.sleepMs });
          await this.clock.sleep(decision.sleepMs);

          const elapsedMs = this.clock.now() - startedAt;
          if (elapsedMs > this.config.pollCeilingMs) {
            state = advance(state, PollState.TIMED_OUT);
            throw new PollTimeoutError(decision.detail, elapsedMs, this.config.pollCeilingMs);
          }
          state = advance(state, PollState.POLLING);
          break;
        }
      }
    }
  }

  private authParams(): Record<string, string> {
    return {
      'api-version': this.config.apiVersion,
      [this.config.credentialParam]: this.config.credential,
    };
  }
}

function advance(from: PollState, to: PollState): PollState {
  if (!canTransition(from, to)) {
    throw new Error(`Invalid poll transition: ${from} → ${to}`);
  }
  return to;
}
