export type CellValue = string | number | boolean | null;

/** A spreadsheet row with a stable identifier assigned at load. */
export interface Row {
  /** Zero-based insertion-order identifier, unique for the whole run. */
  readonly rowId: number;
  readonly cells: Readonly<Record<string, CellValue>>;
}

/** An in-memory sheet: ordered column names plus ordered rows. */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export function createRow(rowId: number, cells: Readonly<Record<string, CellValue>>): Row {
  return { rowId, cells };
}

/** `true` for `null`, `undefined` and strings that are blank after trimming. */
export function isEmptyCell(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  return typeof value === 'string' && value.trim() === '';
}

/** String form of a cell as it would be sent to the geocoder. */
export function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}
