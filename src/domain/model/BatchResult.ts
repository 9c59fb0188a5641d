/** Best match for a single submitted request. */
export interface BatchResult {
  readonly lat: number | null;
  readonly lon: number | null;
  /** Match type, entity type, `"Matched"` or `"No Match"`. */
  readonly status: string;
  readonly confidence: number | null;
}

/** A geocode result paired with the row it was requested for. */
export interface ResultAssociation {
  readonly rowId: number;
  readonly result: BatchResult;
}

export const NO_MATCH_STATUS = 'No Match';
export const MATCHED_STATUS = 'Matched';

export function noMatchResult(): BatchResult {
  return { lat: null, lon: null, status: NO_MATCH_STATUS, confidence: null };
}

export function isMatched(result: BatchResult): boolean {
  return result.status !== NO_MATCH_STATUS;
}
