import { readFile, writeFile } from 'node:fs/promises';
import Papa from 'papaparse';
import type { WorkbookStore } from '../../domain/ports/WorkbookStore.js';
import type { CellValue, Row, Table } from '../../domain/model/Row.js';
import { createRow } from '../../domain/model/Row.js';
import { backupFile } from './backupFile.js';

export interface CsvWorkbookOptions {
  /** Field delimiter. Default: detected on read, `,` for files never read. */
  readonly delimiter?: string;
  /** Clock for the backup file name. Default: `new Date()` at backup time. */
  readonly now?: () => Date;
}

/** Workbook store for a headed CSV file, parsed and written with papaparse. */
export class CsvWorkbook implements WorkbookStore {
  private delimiter: string | undefined;
  private readonly now: () => Date;

  constructor(
    private readonly filePath: string,
    options?: CsvWorkbookOptions,
  ) {
    this.delimiter = options?.delimiter;
    this.now = options?.now ?? (() => new Date());
  }

  async read(): Promise<Table> {
    const content = (await readFile(this.filePath, 'utf-8')).replace(/^\uFEFF/, '');

    const result = Papa.parse<Record<string, string | undefined>>(content, {
      header: true,
      delimiter: this.delimiter ?? '',
      skipEmptyLines: true,
      dynamicTyping: false,
    });
    this.delimiter = this.delimiter ?? result.meta.delimiter;

    const columns = result.meta.fields ?? [];
    const rows: Row[] = result.data.map((record, index) => {
      const cells: Record<string, CellValue> = {};
      for (const column of columns) {
        cells[column] = record[column] ?? null;
      }
      return createRow(index, cells);
    });

    return { columns, rows };
  }

  async write(table: Table): Promise<void> {
    const csv = Papa.unparse(
      {
        fields: [...table.columns],
        data: table.rows.map((row) => table.columns.map((column) => row.cells[column] ?? '')),
      },
      { delimiter: this.delimiter ?? ',' },
    );
    await writeFile(this.filePath, csv, 'utf-8');
  }

  backup(): Promise<string> {
    return backupFile(this.filePath, this.now());
  }

  describe(): string {
    return this.filePath;
  }
}
