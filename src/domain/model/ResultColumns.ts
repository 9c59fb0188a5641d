/** Column names the geocoder reads from and writes to. */
export interface ResultColumns {
  readonly address: string;
  readonly latitude: string;
  readonly longitude: string;
  readonly matchStatus: string;
  readonly confidence: string;
}

export const DEFAULT_RESULT_COLUMNS: ResultColumns = {
  address: 'FullAddress',
  latitude: 'Lat',
  longitude: 'Long',
  matchStatus: 'MatchStatus',
  confidence: 'Confidence',
};

/** The four columns filled from a geocode result, in write order. */
export function resultColumnNames(columns: ResultColumns): readonly string[] {
  return [columns.latitude, columns.longitude, columns.matchStatus, columns.confidence];
}
