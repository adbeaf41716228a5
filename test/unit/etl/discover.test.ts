import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'path';
import { findDataFiles } from '@etl/discover';
import { FixtureDir, createFixtureDir } from '../../helpers/fixture-dir';

describe('findDataFiles', () => {
  let dir: FixtureDir;
  afterEach(() => dir.remove());

  it('should list csv files recursively, skipping earlier stacked output', async () => {
    dir = createFixtureDir();
    dir.write('HARV/2020-07/b.csv', 'a\n');
    dir.write('HARV/2020-06/a.CSV', 'a\n');
    dir.write('readme.txt', 'notes');
    dir.write('stackedFiles/t.csv', 'a\n');

    const found = await findDataFiles(dir.root);
    expect(found.map((f) => path.relative(dir.root, f))).toEqual([
      path.join('HARV', '2020-06', 'a.CSV'),
      path.join('HARV', '2020-07', 'b.csv'),
    ]);
  });

  it('should return nothing for an empty folder', async () => {
    dir = createFixtureDir();
    await expect(findDataFiles(dir.root)).resolves.toEqual([]);
  });
});
