import { CellValue, SiteCode, SourceFileBase, StackedRow } from '@domain/types';
import { POSITION_JOIN_COLUMNS } from './config';

// A row of the consolidated sensor position table, cells as read from disk
export type PositionRecord = Readonly<Record<string, string>>;

export interface PositionedRows {
  readonly columns: readonly string[];
  readonly rows: StackedRow[];
}

const LEADING_COLUMNS = [
  'domainID',
  'siteID',
  'horizontalPosition',
  'verticalPosition',
] as const;

/** HOR.VER key the position table uses for a sensor location. */
export function positionKey(horizontal: string, vertical: string): string {
  return `${horizontal}.${vertical}`;
}

/**
 * Picks the position row for a site and HOR.VER. Locations that were moved
 * have several rows; the one with the latest start date describes the current
 * placement.
 */
export function findPosition(
  positions: readonly PositionRecord[],
  site: SiteCode,
  key: string
): PositionRecord | null {
  let best: PositionRecord | null = null;
  for (const p of positions) {
    if (p['HOR.VER'] !== key) continue;
    if (p['siteID'] !== undefined && p['siteID'] !== site) continue;
    if (
      best === null ||
      (p['positionStartDateTime'] ?? '') >= (best['positionStartDateTime'] ?? '')
    ) {
      best = p;
    }
  }
  return best;
}

/**
 * Adds the location columns a sensor file name carries, plus reference
 * coordinates joined from the position table when one is available. Files
 * without a sensor location are returned unchanged. Columns the file already
 * has are never overwritten.
 */
export function enrichWithPosition(
  columns: readonly string[],
  rows: readonly StackedRow[],
  file: SourceFileBase,
  positions: readonly PositionRecord[] | null
): PositionedRows {
  const location = file.location;
  if (!location) return { columns, rows: [...rows] };

  const present = new Set(columns);
  const added: Record<string, CellValue> = {};
  const lead: string[] = [];
  const leadValues: Record<(typeof LEADING_COLUMNS)[number], string> = {
    domainID: file.domain,
    siteID: file.site,
    horizontalPosition: location.horizontal,
    verticalPosition: location.vertical,
  };
  for (const c of LEADING_COLUMNS) {
    if (present.has(c)) continue;
    lead.push(c);
    added[c] = leadValues[c];
  }

  const trail: string[] = [];
  if (!present.has('publicationDate')) {
    trail.push('publicationDate');
    added['publicationDate'] = file.publication;
  }

  const match = positions
    ? findPosition(positions, file.site, positionKey(location.horizontal, location.vertical))
    : null;
  if (match) {
    for (const c of POSITION_JOIN_COLUMNS) {
      const v = match[c];
      if (v === undefined || present.has(c)) continue;
      trail.push(c);
      added[c] = v;
    }
  }

  return {
    columns: [...lead, ...columns, ...trail],
    rows: rows.map((r) => ({ ...r, ...added })),
  };
}

export interface PositionTableRows {
  readonly columns: readonly string[];
  readonly rows: Record<string, string>[];
}

/** Tags a per-site sensor position file with the site it describes. */
export function enrichPositionTable(
  columns: readonly string[],
  rows: readonly Readonly<Record<string, string>>[],
  site: SiteCode
): PositionTableRows {
  if (columns.includes('siteID')) {
    return { columns, rows: rows.map((r) => ({ ...r })) };
  }
  return {
    columns: ['siteID', ...columns],
    rows: rows.map((r) => ({ siteID: site, ...r })),
  };
}
