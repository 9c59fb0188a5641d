import { readFile, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as XLSX from 'xlsx';
import type { WorkbookStore } from '../../domain/ports/WorkbookStore.js';
import type { CellValue, Row, Table } from '../../domain/model/Row.js';
import { createRow, isEmptyCell } from '../../domain/model/Row.js';
import { SchemaError } from '../../domain/errors/GeocodeErrors.js';
import { backupFile } from './backupFile.js';

export interface XlsxWorkbookOptions {
  /** Sheet to read and overwrite. */
  readonly sheetName: string;
  /** Clock for the backup file name. Default: `new Date()` at backup time. */
  readonly now?: () => Date;
}

const BOOK_TYPES: Readonly<Record<string, XLSX.BookType>> = {
  '.xlsx': 'xlsx',
  '.xlsm': 'xlsm',
  '.xlsb': 'xlsb',
  '.xls': 'biff8',
  '.ods': 'ods',
};

/**
 * Workbook store backed by an Excel file, read and written with SheetJS.
 *
 * The first row of the sheet is the header; repeated header names get a
 * `.1`, `.2` suffix. `write()` patches the sheet in place: it fills cells
 * that are blank in the file and adds header cells for new columns. Cells
 * that already hold a value keep their value and number format, and other
 * sheets of the workbook are kept.
 */
export class XlsxWorkbook implements WorkbookStore {
  private readonly sheetName: string;
  private readonly now: () => Date;

  constructor(
    private readonly filePath: string,
    options: XlsxWorkbookOptions,
  ) {
    this.sheetName = options.sheetName;
    this.now = options.now ?? (() => new Date());
  }

  async read(): Promise<Table> {
    const workbook = await this.load({ cellDates: true });
    const sheet = workbook.Sheets[this.sheetName];
    if (!sheet) {
      throw new SchemaError(`Sheet '${this.sheetName}' not found in ${this.filePath}`, {
        sheetName: this.sheetName,
        sheets: workbook.SheetNames,
      });
    }

    const [header = [], ...body] = sheetGrid(sheet);
    const columns = uniqueHeaders(header);

    const rows: Row[] = body.map((values, rowIndex) => {
      const cells: Record<string, CellValue> = {};
      columns.forEach((column, columnIndex) => {
        cells[column] = toCellValue(values[columnIndex]);
      });
      return createRow(rowIndex, cells);
    });

    return { columns, rows };
  }

  async write(table: Table): Promise<void> {
    const workbook = await this.load({ cellNF: true });
    const sheet = workbook.Sheets[this.sheetName];
    if (sheet) {
      patchSheet(sheet, table);
    } else {
      XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(tableGrid(table)), this.sheetName);
    }

    const bookType = BOOK_TYPES[extname(this.filePath).toLowerCase()] ?? 'xlsx';
    const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType });
    await writeFile(this.filePath, data);
  }

  backup(): Promise<string> {
    return backupFile(this.filePath, this.now());
  }

  describe(): string {
    return `${this.filePath} [${this.sheetName}]`;
  }

  private async load(options: XLSX.ParsingOptions): Promise<XLSX.WorkBook> {
    const buffer = await readFile(this.filePath);
    return XLSX.read(buffer, { ...options, type: 'buffer' });
  }
}

// Blank rows are kept so row `i` of the grid is sheet row `origin + i`.
function sheetGrid(sheet: XLSX.WorkSheet): unknown[][] {
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: true, raw: true });
}

function tableGrid(table: Table): CellValue[][] {
  return [[...table.columns], ...table.rows.map((row) => table.columns.map((column) => row.cells[column] ?? null))];
}

/** Write `table` into `sheet` cell by cell, only where the sheet has no value yet. */
function patchSheet(sheet: XLSX.WorkSheet, table: Table): void {
  const ref = sheet['!ref'];
  const origin = ref ? XLSX.utils.decode_range(ref).s : { r: 0, c: 0 };
  const [header = []] = sheetGrid(sheet);
  const present = new Set(uniqueHeaders(header));

  table.columns.forEach((column, columnIndex) => {
    const c = origin.c + columnIndex;
    if (!present.has(column)) {
      XLSX.utils.sheet_add_aoa(sheet, [[column]], { origin: { r: origin.r, c } });
    }

    table.rows.forEach((row, rowIndex) => {
      const value = row.cells[column] ?? null;
      if (value === null) return;

      const address = XLSX.utils.encode_cell({ r: origin.r + 1 + rowIndex, c });
      const current: XLSX.CellObject | undefined = sheet[address];
      if (!isEmptyCell(toCellValue(current?.v))) return;

      XLSX.utils.sheet_add_aoa(sheet, [[value]], { origin: address });
    });
  });
}

function uniqueHeaders(header: readonly unknown[]): string[] {
  const used = new Set<string>();
  return header.map((value, index) => {
    const base = headerName(value, index);
    let name = base;
    for (let n = 1; used.has(name); n++) {
      name = `${base}.${String(n)}`;
    }
    used.add(name);
    return name;
  });
}

function headerName(value: unknown, index: number): string {
  const text = value === null || value === undefined ? '' : String(value).trim();
  return text === '' ? `Column${String(index + 1)}` : text;
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
