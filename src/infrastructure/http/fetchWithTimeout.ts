import { TransportError } from '../../domain/errors/GeocodeErrors.js';

export interface FetchOptions {
  readonly method: 'GET' | 'POST';
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
  /** Abort the request after this many milliseconds. */
  readonly timeout: number;
}

/**
 * `fetch` with an abort timer. Network failures and timeouts surface as
 * `TransportError`; HTTP statuses are left for the caller to judge.
 *
 * Uses the global `fetch`, which shares Node's connection pool across calls.
 */
export async function fetchWithTimeout(url: string, options: FetchOptions): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, options.timeout);

  try {
    return await fetch(url, {
      method: options.method,
      headers: { ...options.headers },
      body: options.body,
      signal: controller.signal,
    });
  } catch (error) {
    const reason = controller.signal.aborted
      ? `timed out after ${String(options.timeout)}ms`
      : error instanceof Error
        ? error.message
        : String(error);
    throw new TransportError(`${options.method} ${redact(url)} failed: ${reason}`, undefined, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Hide credential-looking query parameters before a URL reaches a log or error. */
export function redact(url: string): string {
  try {
    const parsed = new URL(url);
    for (const key of [...parsed.searchParams.keys()]) {
      if (/key|token|secret|signature/i.test(key)) {
        parsed.searchParams.set(key, '***');
      }
    }
    return parsed.toString();
  } catch {
    return url;
  }
}
