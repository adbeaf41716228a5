import {
  CellValue,
  CoercionWarning,
  DeclaredType,
  FieldTypes,
  StackedRow,
} from '@domain/types';

// Tokens read as the missing-value marker in typed columns
const MISSING_TOKENS = new Set(['', 'NA']);

const INTEGER = /^[-+]?\d+$/;
// Plain decimal notation; Number() alone also takes hex, octal and binary
const DECIMAL = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;

export type CoercedValue =
  | { readonly ok: true; readonly value: CellValue }
  | { readonly ok: false };

export interface CoercionResult {
  readonly columns: readonly string[];
  readonly rows: StackedRow[];
  readonly warnings: readonly CoercionWarning[];
}

function parseTimestamp(text: string): Date | null {
  const match = ISO_TIMESTAMP.exec(text);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // Date.parse rolls impossible days (Feb 30) into the next month
  const calendar = new Date(0);
  calendar.setUTCFullYear(year, month - 1, day);
  if (
    calendar.getUTCFullYear() !== year ||
    calendar.getUTCMonth() !== month - 1 ||
    calendar.getUTCDate() !== day
  ) {
    return null;
  }
  // Times without a zone designator are UTC; date-only forms already are
  const withZone = text.includes('T') && match[4] === undefined ? `${text}Z` : text;
  const ms = Date.parse(withZone);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Casts one cell to its declared type. Values that are already typed (numbers,
 * dates, the missing marker) are returned untouched, so coercing twice is the
 * same as coercing once.
 */
export function coerceValue(value: CellValue, type: DeclaredType): CoercedValue {
  if (typeof value !== 'string' || type === 'string') {
    return { ok: true, value };
  }
  const text = value.trim();
  if (MISSING_TOKENS.has(text)) return { ok: true, value: null };

  switch (type) {
    case 'numeric': {
      if (!DECIMAL.test(text)) return { ok: false };
      const n = Number(text);
      return Number.isFinite(n) ? { ok: true, value: n } : { ok: false };
    }
    case 'integer': {
      if (!INTEGER.test(text)) return { ok: false };
      const n = Number.parseInt(text, 10);
      return Number.isSafeInteger(n) ? { ok: true, value: n } : { ok: false };
    }
    case 'timestamp': {
      const d = parseTimestamp(text);
      return d ? { ok: true, value: d } : { ok: false };
    }
  }
}

/**
 * Applies declared types to every row. Fields without a declared type pass
 * through as strings. A cell that fails its cast becomes null and is reported
 * as a warning; the row itself is kept.
 */
export function coerceRows(
  columns: readonly string[],
  rows: readonly Readonly<Record<string, CellValue>>[],
  fieldTypes: FieldTypes
): CoercionResult {
  const typed = columns.flatMap((c) => {
    const t = fieldTypes[c];
    return t === undefined ? [] : [[c, t] as const];
  });
  const warnings: CoercionWarning[] = [];

  const out = rows.map((r, idx) => {
    const row: StackedRow = { ...r };
    for (const [field, declaredType] of typed) {
      const raw = r[field] ?? null;
      const result = coerceValue(raw, declaredType);
      if (result.ok) {
        row[field] = result.value;
      } else {
        row[field] = null;
        warnings.push({
          field,
          declaredType,
          row: idx + 1,
          value: String(raw),
        });
      }
    }
    return row;
  });

  return { columns: [...columns], rows: out, warnings };
}
