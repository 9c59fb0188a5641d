import type { CellValue, Row, Table } from '../model/Row.js';
import type { ResultColumns } from '../model/ResultColumns.js';
import { createRow, cellText } from '../model/Row.js';
import { resultColumnNames } from '../model/ResultColumns.js';
import { SchemaError } from '../errors/GeocodeErrors.js';

export interface PreparedRows {
  /** Full table with every result column present and fresh row ids. */
  readonly table: Table;
  /** Rows with a non-blank address, in table order. */
  readonly eligible: readonly Row[];
}

/**
 * Ready a loaded sheet for geocoding.
 *
 * Missing result columns are appended with empty cells, every row gets an
 * insertion-order `rowId`, and rows whose trimmed address is non-empty are
 * returned as the eligible subset. The input table is not modified.
 */
export function prepareRows(source: Table, columns: ResultColumns): PreparedRows {
  if (!source.columns.includes(columns.address)) {
    throw new SchemaError(`Missing '${columns.address}' column in sheet`, {
      column: columns.address,
      columns: source.columns,
    });
  }

  const missing = resultColumnNames(columns).filter((name) => !source.columns.includes(name));
  const tableColumns = [...source.columns, ...missing];

  const rows = source.rows.map((row, index) => {
    const cells: Record<string, CellValue> = { ...row.cells };
    for (const name of missing) {
      cells[name] = null;
    }
    return createRow(index, cells);
  });

  const eligible = rows.filter((row) => cellText(row.cells[columns.address]) !== '');

  return { table: { columns: tableColumns, rows }, eligible };
}
