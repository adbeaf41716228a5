import { describe, it, expect } from 'vitest';
import { createTableName } from '@domain/types';
import { MergeError } from '@domain/errors';
import { outerUnion } from '@etl/row-union';

const T1 = createTableName('T1');

describe('outerUnion', () => {
  it('should take every column in first-seen order and fill gaps with null', () => {
    const { table, stats } = outerUnion(T1, [
      { source: 'f1', columns: ['a', 'b'], rows: [{ a: '1', b: '2' }] },
      { source: 'f2', columns: ['a', 'c'], rows: [{ a: '3', c: '4' }, { a: '5', c: '6' }] },
    ]);

    expect(table.columns).toEqual(['a', 'b', 'c']);
    expect(table.rows).toEqual([
      { a: '1', b: '2', c: null },
      { a: '3', b: null, c: '4' },
      { a: '5', b: null, c: '6' },
    ]);
    expect(table.fileCount).toBe(2);
    expect(stats).toEqual({ fileCount: 2, rowCount: 3, columnCount: 3, filledColumns: 2 });
  });

  it('should keep files that contribute a header but no rows', () => {
    const { table } = outerUnion(T1, [
      { source: 'f1', columns: ['a'], rows: [{ a: '1' }] },
      { source: 'f2', columns: ['z'], rows: [] },
    ]);
    expect(table.columns).toEqual(['a', 'z']);
    expect(table.rows).toEqual([{ a: '1', z: null }]);
  });

  it('should produce an empty table from no inputs', () => {
    const { table } = outerUnion(T1, []);
    expect(table.columns).toEqual([]);
    expect(table.rows).toEqual([]);
  });

  it('should reject a header with a repeated column', () => {
    expect(() =>
      outerUnion(T1, [{ source: 'f1', columns: ['a', 'a'], rows: [] }])
    ).toThrow("Cannot stack T1: column 'a' appears twice in f1");
  });

  it('should reject a column that is numeric in one file and a timestamp in another', () => {
    const run = () =>
      outerUnion(T1, [
        { source: 'f1', columns: ['v'], rows: [{ v: 1 }] },
        { source: 'f2', columns: ['v'], rows: [{ v: new Date(0) }] },
      ]);
    expect(run).toThrow(MergeError);
    expect(run).toThrow("Cannot stack T1: column 'v' is number in f1 but date in f2");
  });

  it('should allow text alongside typed values in a column', () => {
    const { table } = outerUnion(T1, [
      { source: 'f1', columns: ['v'], rows: [{ v: 1 }] },
      { source: 'f2', columns: ['v'], rows: [{ v: 'n/a' }, { v: null }] },
    ]);
    expect(table.rows.map((r) => r['v'])).toEqual([1, 'n/a', null]);
  });
});
