/**
 * First non-empty value among `headerNames`, in list order.
 *
 * `Headers.get` is case-insensitive, so `location` and `Location` match alike.
 */
export function findContinuationUrl(headers: Headers, headerNames: readonly string[]): string | null {
  for (const name of headerNames) {
    const value = headers.get(name)?.trim();
    if (value) return value;
  }
  return null;
}

/**
 * Add `params` to the query string of `url` without duplicating keys.
 *
 * Parameters already on the URL win over the ones passed in, so merging the
 * same parameters twice returns the same URL. Relative URLs resolve against
 * `base`.
 */
export function mergeQueryParams(url: string, params: Readonly<Record<string, string>>, base?: string): string {
  const target = new URL(url, base);
  for (const [key, value] of Object.entries(params)) {
    if (!target.searchParams.has(key)) {
      target.searchParams.set(key, value);
    }
  }
  return target.toString();
}
