import { describe, it, expect, afterEach } from 'vitest';
import { TableSourceFile } from '@domain/types';
import { classifyFile } from '@etl/file-classifier';
import { isLoadFileTask, isLoadedFile, loadSourceFile } from '@etl/load-source-file';
import { TableTypeDictionary } from '@etl/table-types';
import { FixtureDir, TABLE_TYPES_CSV, createFixtureDir } from '../../helpers/fixture-dir';

const dictionary = TableTypeDictionary.parse(TABLE_TYPES_CSV);
const SENSOR_NAME =
  'NEON.D01.HARV.DP1.00001.001.000.010.002.2DWSD_2min.2020-01.basic.20200201T000000Z.csv';

function tableFile(filePath: string): TableSourceFile {
  const file = classifyFile(filePath, dictionary);
  if (file.kind !== 'table') throw new Error(`${filePath} is not a table file`);
  return file;
}

describe('loadSourceFile', () => {
  let dir: FixtureDir;
  afterEach(() => dir.remove());

  it('should parse, coerce and enrich one file', async () => {
    dir = createFixtureDir();
    const filePath = dir.write(
      SENSOR_NAME,
      'startDateTime,windSpeedMean\n2020-01-01T00:00:00Z,3.5\n2020-01-01T00:02:00Z,calm\n'
    );
    const loaded = await loadSourceFile({
      file: tableFile(filePath),
      fieldTypes: { startDateTime: 'timestamp', windSpeedMean: 'numeric' },
      positions: [{ siteID: 'HARV', 'HOR.VER': '000.010', referenceElevation: '340' }],
    });

    expect(loaded.source).toBe(SENSOR_NAME);
    expect(loaded.columns).toEqual([
      'domainID',
      'siteID',
      'horizontalPosition',
      'verticalPosition',
      'startDateTime',
      'windSpeedMean',
      'publicationDate',
      'referenceElevation',
    ]);
    expect(loaded.rows[0]?.['windSpeedMean']).toBe(3.5);
    expect(loaded.rows[0]?.['startDateTime']).toEqual(new Date('2020-01-01T00:00:00Z'));
    expect(loaded.rows[1]?.['windSpeedMean']).toBeNull();
    expect(loaded.rows[1]?.['referenceElevation']).toBe('340');
    expect(loaded.coercionFailures).toBe(1);
    expect(loaded.sampleWarnings).toEqual([
      { field: 'windSpeedMean', declaredType: 'numeric', row: 2, value: 'calm' },
    ]);
    expect(isLoadedFile(loaded)).toBe(true);
  });

  it('should keep at most five sample warnings', async () => {
    dir = createFixtureDir();
    const body = Array.from({ length: 7 }, () => 'bad').join('\n');
    const filePath = dir.write(
      'NEON.D01.HARV.DP1.10003.001.brd_perpoint.2020-06.basic.20200701.csv',
      `pointCountMinute\n${body}\n`
    );
    const loaded = await loadSourceFile({
      file: tableFile(filePath),
      fieldTypes: { pointCountMinute: 'integer' },
      positions: null,
    });
    expect(loaded.coercionFailures).toBe(7);
    expect(loaded.sampleWarnings.map((w) => w.row)).toEqual([1, 2, 3, 4, 5]);
  });
});

describe('task and result guards', () => {
  it('should recognise well-formed tasks only', () => {
    const file = tableFile('NEON.D01.HARV.DP1.10003.001.brd_perpoint.2020-06.basic.20200701.csv');
    expect(isLoadFileTask({ file, fieldTypes: {}, positions: null })).toBe(true);
    expect(isLoadFileTask({ file, fieldTypes: {}, positions: 'none' })).toBe(false);
    expect(isLoadFileTask({ file: { ...file, kind: 'sidecar' }, fieldTypes: {}, positions: null })).toBe(false);
    expect(isLoadFileTask(null)).toBe(false);
  });

  it('should reject malformed results', () => {
    expect(isLoadedFile({ source: 'f', columns: [], rows: [] })).toBe(false);
  });
});
