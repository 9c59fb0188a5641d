import type { Row } from '../model/Row.js';

/**
 * Domain service that groups eligible rows into fixed-size batches.
 *
 * Pure logic, no I/O. Chunk order and row order inside a chunk follow the
 * input exactly: position is the only link between a submitted request and
 * its result.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error('Batch size must be a positive integer');
    }
  }

  /** Number of batches `split()` yields for `rowCount` rows. */
  countBatches(rowCount: number): number {
    return Math.ceil(rowCount / this.batchSize);
  }

  /**
   * Split rows into batches of `batchSize`.
   *
   * The final batch may contain fewer rows than `batchSize`.
   */
  async *split(
    rows: Iterable<Row> | AsyncIterable<Row>,
  ): AsyncIterable<{ readonly rows: readonly Row[]; readonly batchIndex: number }> {
    let buffer: Row[] = [];
    let batchIndex = 0;

    for await (const row of rows) {
      buffer.push(row);

      if (buffer.length >= this.batchSize) {
        yield { rows: buffer, batchIndex };
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { rows: buffer, batchIndex };
    }
  }
}
