import { promises as fsp } from 'fs';
import { csvFormat, csvParse } from 'd3-dsv';
import { CellValue, RowSet } from '@domain/types';

// Untyped table exactly as read from disk
export interface RawTable {
  readonly columns: readonly string[];
  readonly rows: readonly Record<string, string>[];
}

// Utility: remove BOM
export function stripBOM(content: string): string {
  return content.replace(/^[\ufeff]+/, '');
}

/**
 * RFC 4180 parsing via d3-dsv. Header order is preserved as-is, duplicates
 * included, so callers can reject ambiguous headers.
 */
export function parseDelimited(content: string): RawTable {
  const parsed = csvParse(stripBOM(content));
  const columns = [...parsed.columns];
  const rows = parsed.map((r) => {
    const row: Record<string, string> = {};
    for (const c of columns) row[c] = r[c] ?? '';
    return row;
  });
  return { columns, rows };
}

export async function readDelimitedFile(filePath: string): Promise<RawTable> {
  const content = await fsp.readFile(filePath, 'utf-8');
  return parseDelimited(content);
}

function formatCell(value: CellValue): string | number | null {
  return value instanceof Date ? value.toISOString() : value;
}

// null cells become empty fields; Date cells are written as full ISO 8601
export function formatDelimited(table: RowSet): string {
  const rows = table.rows.map((r) => {
    const out: Record<string, string | number | null> = {};
    for (const c of table.columns) out[c] = formatCell(r[c] ?? null);
    return out;
  });
  return csvFormat(rows, [...table.columns]);
}

export async function writeDelimitedFile(
  filePath: string,
  table: RowSet
): Promise<void> {
  await fsp.writeFile(filePath, formatDelimited(table) + '\n', 'utf-8');
}
