import { CoercionWarning, FieldTypes, TableSourceFile } from '@domain/types';
import { readDelimitedFile } from './csv-io';
import { coerceRows } from './schema-coercer';
import { PositionRecord, enrichWithPosition } from './position-enricher';
import { FileRowSet } from './row-union';

// Per-file unit of work; plain data so it can be posted to a worker thread
export interface LoadFileTask {
  readonly file: TableSourceFile;
  readonly fieldTypes: FieldTypes;
  readonly positions: readonly PositionRecord[] | null;
}

export interface LoadedFile extends FileRowSet {
  readonly coercionFailures: number;
  readonly sampleWarnings: readonly CoercionWarning[];
}

const MAX_SAMPLE_WARNINGS = 5;

/** parse → coerce → enrich for one selected file. */
export async function loadSourceFile(task: LoadFileTask): Promise<LoadedFile> {
  const raw = await readDelimitedFile(task.file.path);
  const coerced = coerceRows(raw.columns, raw.rows, task.fieldTypes);
  const enriched = enrichWithPosition(
    coerced.columns,
    coerced.rows,
    task.file,
    task.positions
  );
  return {
    source: task.file.fileName,
    columns: enriched.columns,
    rows: enriched.rows,
    coercionFailures: coerced.warnings.length,
    sampleWarnings: coerced.warnings.slice(0, MAX_SAMPLE_WARNINGS),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// Shape check for results that crossed a thread boundary
export function isLoadedFile(value: unknown): value is LoadedFile {
  return (
    isRecord(value) &&
    typeof value['source'] === 'string' &&
    Array.isArray(value['columns']) &&
    Array.isArray(value['rows']) &&
    typeof value['coercionFailures'] === 'number' &&
    Array.isArray(value['sampleWarnings'])
  );
}

export function isLoadFileTask(value: unknown): value is LoadFileTask {
  if (!isRecord(value)) return false;
  const file = value['file'];
  const positions = value['positions'];
  return (
    isRecord(file) &&
    file['kind'] === 'table' &&
    typeof file['path'] === 'string' &&
    typeof file['fileName'] === 'string' &&
    isRecord(value['fieldTypes']) &&
    (positions === null || Array.isArray(positions))
  );
}
