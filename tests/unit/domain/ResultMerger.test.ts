import { describe, it, expect } from 'vitest';
import { mergeResults } from '../../../src/domain/services/ResultMerger.js';
import { DEFAULT_RESULT_COLUMNS } from '../../../src/domain/model/ResultColumns.js';
import { noMatchResult } from '../../../src/domain/model/BatchResult.js';
import type { BatchResult } from '../../../src/domain/model/BatchResult.js';
import { table } from '../../helpers/fakes.js';

const COLUMNS = ['FullAddress', 'Lat', 'Long', 'MatchStatus', 'Confidence'];

const hit: BatchResult = { lat: 47.6, lon: -122.3, status: 'Point Address', confidence: 0.95 };

describe('mergeResults', () => {
  it('should fill empty result cells of associated rows', () => {
    const source = table(COLUMNS, [['1 Main St', null, null, null, null]]);

    const merged = mergeResults(source, [{ rowId: 0, result: hit }], DEFAULT_RESULT_COLUMNS);

    expect(merged.rows[0]?.cells).toEqual({
      FullAddress: '1 Main St',
      Lat: 47.6,
      Long: -122.3,
      MatchStatus: 'Point Address',
      Confidence: 0.95,
    });
  });

  it('should leave previously set cells unchanged', () => {
    const source = table(COLUMNS, [['1 Main St', 10, '', '  ', 'manual']]);

    const merged = mergeResults(source, [{ rowId: 0, result: hit }], DEFAULT_RESULT_COLUMNS);

    expect(merged.rows[0]?.cells).toEqual({
      FullAddress: '1 Main St',
      Lat: 10,
      Long: -122.3,
      MatchStatus: 'Point Address',
      Confidence: 'manual',
    });
  });

  it('should keep zero and false as set values', () => {
    const source = table(COLUMNS, [['1 Main St', 0, false, null, null]]);

    const merged = mergeResults(source, [{ rowId: 0, result: hit }], DEFAULT_RESULT_COLUMNS);

    expect(merged.rows[0]?.cells['Lat']).toBe(0);
    expect(merged.rows[0]?.cells['Long']).toBe(false);
  });

  it('should write null coordinates and "No Match" for unmatched rows', () => {
    const source = table(COLUMNS, [['nowhere', null, null, null, null]]);

    const merged = mergeResults(source, [{ rowId: 0, result: noMatchResult() }], DEFAULT_RESULT_COLUMNS);

    expect(merged.rows[0]?.cells).toEqual({
      FullAddress: 'nowhere',
      Lat: null,
      Long: null,
      MatchStatus: 'No Match',
      Confidence: null,
    });
  });

  it('should pass rows without a result through untouched', () => {
    const source = table(COLUMNS, [
      ['1 Main St', null, null, null, null],
      ['', null, null, null, null],
      ['2 Oak Ave', null, null, null, null],
    ]);

    const merged = mergeResults(source, [{ rowId: 0, result: hit }, { rowId: 2, result: hit }], DEFAULT_RESULT_COLUMNS);

    expect(merged.rows[1]).toBe(source.rows[1]);
  });

  it('should never change row count or order', () => {
    const source = table(
      COLUMNS,
      Array.from({ length: 6 }, (_, i) => [`${String(i)} Main St`, null, null, null, null]),
    );
    const associations = [4, 1, 5].map((rowId) => ({ rowId, result: hit }));

    const merged = mergeResults(source, associations, DEFAULT_RESULT_COLUMNS);

    expect(merged.rows.map((r) => r.rowId)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(merged.columns).toEqual(COLUMNS);
  });

  it('should ignore results for unknown row ids', () => {
    const source = table(COLUMNS, [['1 Main St', null, null, null, null]]);

    const merged = mergeResults(source, [{ rowId: 99, result: hit }], DEFAULT_RESULT_COLUMNS);

    expect(merged.rows).toHaveLength(1);
    expect(merged.rows[0]).toBe(source.rows[0]);
  });
});
