import type { CellValue, Row, Table } from '../model/Row.js';
import type { BatchResult, ResultAssociation } from '../model/BatchResult.js';
import type { ResultColumns } from '../model/ResultColumns.js';
import { isEmptyCell } from '../model/Row.js';

/**
 * Back-fill result columns from geocode results.
 *
 * A result cell is written only when it is currently empty; rows without an
 * association pass through as the same object. Row count and order never
 * change.
 */
export function mergeResults(
  table: Table,
  associations: readonly ResultAssociation[],
  columns: ResultColumns,
): Table {
  const byRowId = new Map<number, BatchResult>();
  for (const { rowId, result } of associations) {
    byRowId.set(rowId, result);
  }

  const rows = table.rows.map((row) => {
    const result = byRowId.get(row.rowId);
    return result ? fillRow(row, result, columns) : row;
  });

  return { columns: table.columns, rows };
}

function fillRow(row: Row, result: BatchResult, columns: ResultColumns): Row {
  const updates: [string, CellValue][] = [
    [columns.latitude, result.lat],
    [columns.longitude, result.lon],
    [columns.matchStatus, result.status],
    [columns.confidence, result.confidence],
  ];

  const cells: Record<string, CellValue> = { ...row.cells };
  for (const [column, value] of updates) {
    if (isEmptyCell(cells[column])) {
      cells[column] = value;
    }
  }
  return { rowId: row.rowId, cells };
}
