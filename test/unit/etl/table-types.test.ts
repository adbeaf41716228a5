import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { TableTypeDictionary, stripPubSuffix } from '@etl/table-types';
import { ConfigurationError } from '@domain/errors';
import { TABLE_TYPES_CSV } from '../../helpers/fixture-dir';

describe('TableTypeDictionary', () => {
  const dictionary = TableTypeDictionary.parse(TABLE_TYPES_CSV);

  it('should resolve known table names to their type', () => {
    expect(dictionary.size).toBe(6);
    expect(dictionary.lookup('brd_references')).toEqual({
      tableName: 'brd_references',
      tableType: 'site-all',
    });
  });

  it('should strip a _pub suffix before lookup', () => {
    expect(stripPubSuffix('brd_perpoint_pub')).toBe('brd_perpoint');
    expect(dictionary.lookup('brd_perpoint_pub')).toEqual({
      tableName: 'brd_perpoint',
      tableType: 'site-date',
    });
  });

  it('should return null for unknown names', () => {
    expect(dictionary.lookup('mam_pertrapnight')).toBeNull();
    expect(dictionary.lookup('not a table')).toBeNull();
  });

  it('should reject unknown table types', () => {
    expect(() =>
      TableTypeDictionary.fromEntries([{ tableName: 't1', tableType: 'daily' }])
    ).toThrow(ConfigurationError);
  });

  it('should reject a name listed with two different types', () => {
    expect(() =>
      TableTypeDictionary.fromEntries([
        { tableName: 't1', tableType: 'site-date' },
        { tableName: 't1', tableType: 'site-all' },
      ])
    ).toThrow('Table t1 is listed as both site-date and site-all');
  });

  it('should accept repeated identical entries', () => {
    const d = TableTypeDictionary.fromEntries([
      { tableName: 't1', tableType: 'site-date' },
      { tableName: 't1', tableType: 'site-date' },
    ]);
    expect(d.size).toBe(1);
  });

  it('should require tableName and tableType columns', () => {
    expect(() => TableTypeDictionary.parse('name,type\nt1,site-date\n')).toThrow(
      'Table type dictionary is missing columns: tableName, tableType'
    );
  });

  it('should load the bundled reference dictionary', async () => {
    const bundled = await TableTypeDictionary.load(
      path.join(process.cwd(), 'data/reference/table_types.csv')
    );
    expect(bundled.lookup('SAAT_30min')?.tableType).toBe('site-date');
    expect(bundled.lookup('sls_labSummary')?.tableType).toBe('lab-current');
  });
});
