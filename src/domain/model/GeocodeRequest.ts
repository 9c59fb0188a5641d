import type { Row } from './Row.js';
import { cellText } from './Row.js';

/** One entry of the `batchItems` array posted to the batch endpoint. */
export interface GeocodeRequest {
  readonly query: string;
  readonly countrySet: string;
}

/** Build requests one-to-one with `rows`; request `i` belongs to row `i`. */
export function buildGeocodeRequests(
  rows: readonly Row[],
  addressColumn: string,
  countrySet: string,
): GeocodeRequest[] {
  return rows.map((row) => ({
    query: cellText(row.cells[addressColumn]),
    countrySet,
  }));
}
