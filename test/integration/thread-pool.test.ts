import { describe, it, expect, afterEach } from 'vitest';
import { classifyFile } from '@etl/file-classifier';
import { LoadPool, createLoadPool } from '@etl/stack-data-files';
import { TableTypeDictionary } from '@etl/table-types';
import { ThreadPool } from '@infrastructure/worker-pool';
import { TableSourceFile } from '@domain/types';
import { FixtureDir, TABLE_TYPES_CSV, createFixtureDir, observationName } from '../helpers/fixture-dir';

const dictionary = TableTypeDictionary.parse(TABLE_TYPES_CSV);

function tableFile(filePath: string): TableSourceFile {
  const file = classifyFile(filePath, dictionary);
  if (file.kind !== 'table') throw new Error(`${filePath} is not a table file`);
  return file;
}

describe('createLoadPool', () => {
  let dir: FixtureDir;
  let pool: LoadPool | null = null;

  afterEach(async () => {
    await pool?.close();
    pool = null;
    dir.remove();
  });

  it('should load files on worker threads', async () => {
    dir = createFixtureDir();
    const first = dir.write(
      observationName('HARV', 'brd_perpoint', '2020-06', '20200701'),
      'plotID,startDate\nHARV_001,2020-06-01T08:00:00Z\n'
    );
    const second = dir.write(
      observationName('BART', 'brd_perpoint', '2020-06', '20200701'),
      'plotID,startDate\nBART_001,2020-02-30T08:00:00Z\n'
    );
    pool = createLoadPool(2);
    expect(pool).toBeInstanceOf(ThreadPool);

    const fieldTypes = { startDate: 'timestamp' } as const;
    const [a, b] = await Promise.all([
      pool.run({ file: tableFile(first), fieldTypes, positions: null }),
      pool.run({ file: tableFile(second), fieldTypes, positions: null }),
    ]);

    expect(a.rows).toEqual([{ plotID: 'HARV_001', startDate: new Date('2020-06-01T08:00:00Z') }]);
    expect(a.coercionFailures).toBe(0);
    expect(b.rows).toEqual([{ plotID: 'BART_001', startDate: null }]);
    expect(b.coercionFailures).toBe(1);
  }, 30_000);

  it('should reject the task when a worker fails to read its file', async () => {
    dir = createFixtureDir();
    const missing = `${dir.root}/${observationName('HARV', 'brd_perpoint', '2020-06', '20200701')}`;
    pool = createLoadPool(2);

    await expect(
      pool.run({ file: tableFile(missing), fieldTypes: {}, positions: null })
    ).rejects.toThrow('ENOENT');
  }, 30_000);
});
