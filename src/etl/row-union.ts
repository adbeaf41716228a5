import { CellValue, StackedRow, StackedTable, TableName } from '@domain/types';
import { MergeError } from '@domain/errors';

// One file's contribution to a stacked table
export interface FileRowSet {
  readonly source: string;
  readonly columns: readonly string[];
  readonly rows: readonly StackedRow[];
}

// Union statistics for observability
export interface UnionStats {
  readonly fileCount: number;
  readonly rowCount: number;
  readonly columnCount: number;
  readonly filledColumns: number; // (file, column) pairs filled with the missing marker
}

export interface UnionResult {
  readonly table: StackedTable;
  readonly stats: UnionStats;
}

type CellKind = 'number' | 'date' | 'string';

function kindOf(value: CellValue): CellKind | null {
  if (value === null) return null;
  if (typeof value === 'number') return 'number';
  if (value instanceof Date) return 'date';
  return 'string';
}

function findDuplicate(columns: readonly string[]): string | null {
  const seen = new Set<string>();
  for (const c of columns) {
    if (seen.has(c)) return c;
    seen.add(c);
  }
  return null;
}

/**
 * Outer-union concatenation: the output schema is every column of every file
 * in first-seen order, rows are stacked in input order, and a column a file
 * lacks is null for all of that file's rows. No row is ever dropped.
 *
 * Fails with MergeError when a file header is ambiguous (a repeated column)
 * or when one column holds numbers in one file and timestamps in another.
 */
export function outerUnion(
  tableName: TableName,
  rowSets: readonly FileRowSet[]
): UnionResult {
  const columns: string[] = [];
  const known = new Set<string>();
  const kinds = new Map<string, { kind: CellKind; source: string }>();

  for (const set of rowSets) {
    const dup = findDuplicate(set.columns);
    if (dup !== null) {
      throw new MergeError(
        `Cannot stack ${tableName}: column '${dup}' appears twice in ${set.source}`,
        tableName
      );
    }
    for (const c of set.columns) {
      if (!known.has(c)) {
        known.add(c);
        columns.push(c);
      }
    }
    for (const row of set.rows) {
      for (const c of set.columns) {
        const kind = kindOf(row[c] ?? null);
        if (kind === null || kind === 'string') continue;
        const prior = kinds.get(c);
        if (!prior) {
          kinds.set(c, { kind, source: set.source });
        } else if (prior.kind !== kind) {
          throw new MergeError(
            `Cannot stack ${tableName}: column '${c}' is ${prior.kind} in ${prior.source} but ${kind} in ${set.source}`,
            tableName
          );
        }
      }
    }
  }

  const rows: StackedRow[] = [];
  let filledColumns = 0;
  for (const set of rowSets) {
    const own = new Set(set.columns);
    filledColumns += columns.filter((c) => !own.has(c)).length;
    for (const row of set.rows) {
      const out: StackedRow = {};
      for (const c of columns) out[c] = own.has(c) ? (row[c] ?? null) : null;
      rows.push(out);
    }
  }

  return {
    table: { tableName, columns, rows, fileCount: rowSets.length },
    stats: {
      fileCount: rowSets.length,
      rowCount: rows.length,
      columnCount: columns.length,
      filledColumns,
    },
  };
}
