import type { Table } from '../model/Row.js';

/**
 * Persistence for the sheet being geocoded.
 *
 * `read()` must return rows in document order; `write()` stores the table
 * in place. `backup()` copies the current file byte for byte and returns the
 * backup path.
 */
export interface WorkbookStore {
  read(): Promise<Table>;
  write(table: Table): Promise<void>;
  backup(): Promise<string>;
  /** Human-readable location, used in log lines. */
  describe(): string;
}
