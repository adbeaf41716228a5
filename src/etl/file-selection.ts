import { SiteCode, SourceFileBase, TableSourceFile } from '@domain/types';
import { TableGroup, compareOrdinal } from './file-classifier';

export type FileSelection =
  | { readonly mode: 'stack'; readonly files: readonly TableSourceFile[] }
  | { readonly mode: 'copy'; readonly files: readonly TableSourceFile[] };

/**
 * Orders files by publication token, then by full path. Tokens are
 * date-formatted, so string order is chronological; equal tokens fall back to
 * path order so the choice never depends on discovery order.
 */
export function comparePublication(
  a: SourceFileBase,
  b: SourceFileBase
): number {
  return (
    compareOrdinal(a.publication, b.publication) || compareOrdinal(a.path, b.path)
  );
}

export function mostRecent<T extends SourceFileBase>(
  files: readonly T[]
): T | null {
  let latest: T | null = null;
  for (const f of files) {
    if (latest === null || comparePublication(f, latest) > 0) latest = f;
  }
  return latest;
}

/** Keeps the most recent file for each site code, ordered by site. */
export function latestPerSite<T extends SourceFileBase>(
  files: readonly T[]
): T[] {
  const bySite = new Map<SiteCode, T>();
  for (const f of files) {
    const current = bySite.get(f.site);
    if (!current || comparePublication(f, current) > 0) bySite.set(f.site, f);
  }
  return [...bySite.entries()]
    .sort(([a], [b]) => compareOrdinal(a, b))
    .map(([, f]) => f);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled table type: ${String(value)}`);
}

/**
 * Decides which files of a table participate and whether they are stacked or
 * copied. Site-all tables are cumulative snapshots, so only the newest one
 * per site counts. Lab tables carry the lab identifier in the site slot and
 * are copied once per lab.
 */
export function selectTableFiles(group: TableGroup): FileSelection {
  switch (group.tableType) {
    case 'site-date':
    case 'other':
      return { mode: 'stack', files: group.files };
    case 'site-all':
      return { mode: 'stack', files: latestPerSite(group.files) };
    case 'lab-current':
    case 'lab-all':
      return { mode: 'copy', files: latestPerSite(group.files) };
    default:
      return assertNever(group.tableType);
  }
}
