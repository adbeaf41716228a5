import * as path from 'path';
import {
  SensorLocation,
  SidecarCategory,
  SidecarSourceFile,
  SourceFile,
  SourceFileBase,
  TableName,
  TableSourceFile,
  TableType,
  createSiteCode,
  isSidecarCategory,
  isValidPublicationToken,
  isValidSiteCode,
} from '@domain/types';
import { ClassificationError } from '@domain/errors';
import { OUTPUT_EXTENSION } from './config';
import { TableTypeDictionary } from './table-types';

// Name tokens before the optional sensor location:
// <prefix>.<domain>.<site>.<DPn>.<product>.<revision>
const HEADER_TOKENS = 6;
const THREE_DIGITS = /^\d{3}$/;
const MONTH = /^\d{4}-\d{2}$/;

export interface ParsedFileName extends Omit<SourceFileBase, 'path'> {
  readonly tableToken: string;
}

function fail(fileName: string, reason: string): never {
  throw new ClassificationError(
    `Cannot classify ${fileName}: ${reason}`,
    fileName
  );
}

/**
 * Parses the dotted identity of a data file name once, e.g.
 * `NEON.D01.HARV.DP1.00001.001.000.010.002.2DWSD_2min.2020-01.basic.20200201T000000Z.csv`.
 */
export function parseFileName(fileName: string): ParsedFileName {
  const tokens = fileName.split('.');
  const ext = tokens[tokens.length - 1] ?? '';
  if (ext.toLowerCase() !== OUTPUT_EXTENSION) {
    fail(fileName, `expected a .${OUTPUT_EXTENSION} file`);
  }
  if (tokens.length < HEADER_TOKENS + 3) {
    fail(fileName, 'too few name segments');
  }

  const [, domain = '', site = '', level = '', product = '', revision = ''] =
    tokens;
  if (!/^DP\d$/.test(level) || !/^\d{5}$/.test(product) || !THREE_DIGITS.test(revision)) {
    fail(fileName, 'no data product identifier in name');
  }
  if (!isValidSiteCode(site)) {
    fail(fileName, `invalid site code '${site}'`);
  }

  const publication = tokens[tokens.length - 2] ?? '';
  if (!isValidPublicationToken(publication)) {
    fail(fileName, `invalid publication token '${publication}'`);
  }

  // Sensor data carries HOR.VER.TMI before the table token
  let idx = HEADER_TOKENS;
  let location: SensorLocation | undefined;
  const [hor = '', ver = '', tmi = ''] = tokens.slice(idx, idx + 3);
  if (
    tokens.length >= idx + 6 &&
    THREE_DIGITS.test(hor) &&
    THREE_DIGITS.test(ver) &&
    THREE_DIGITS.test(tmi)
  ) {
    location = { horizontal: hor, vertical: ver, temporalIndex: tmi };
    idx += 3;
  }

  const tableToken = tokens[idx] ?? '';
  if (tableToken === '' || idx >= tokens.length - 2) {
    fail(fileName, 'no table name in name');
  }

  let month: string | undefined;
  let packageType: 'basic' | 'expanded' | undefined;
  for (const token of tokens.slice(idx + 1, tokens.length - 2)) {
    if (MONTH.test(token) && month === undefined) {
      month = token;
    } else if (
      (token === 'basic' || token === 'expanded') &&
      packageType === undefined
    ) {
      packageType = token;
    } else {
      fail(fileName, `unexpected name segment '${token}'`);
    }
  }

  return {
    fileName,
    domain,
    site: createSiteCode(site),
    product: `${level}.${product}.${revision}`,
    ...(location ? { location } : {}),
    ...(month ? { month } : {}),
    ...(packageType ? { packageType } : {}),
    publication,
    tableToken,
  };
}

/**
 * Maps a file to a stackable table or a sidecar category. A table token that
 * the dictionary does not know is a ClassificationError, never skipped.
 */
export function classifyFile(
  filePath: string,
  dictionary: TableTypeDictionary
): SourceFile {
  const { tableToken, ...base } = parseFileName(path.basename(filePath));
  if (isSidecarCategory(tableToken)) {
    const sidecar: SidecarSourceFile = {
      ...base,
      path: filePath,
      kind: 'sidecar',
      category: tableToken,
    };
    return sidecar;
  }
  const entry = dictionary.lookup(tableToken);
  if (!entry) {
    fail(base.fileName, `table '${tableToken}' is not in the table type dictionary`);
  }
  const table: TableSourceFile = {
    ...base,
    path: filePath,
    kind: 'table',
    tableName: entry.tableName,
    tableType: entry.tableType,
  };
  return table;
}

/**
 * Classifies every discovered file before any merge decision. All failures are
 * gathered and reported together in a single ClassificationError.
 */
export function classifyFiles(
  filePaths: readonly string[],
  dictionary: TableTypeDictionary
): SourceFile[] {
  const files: SourceFile[] = [];
  const failures: ClassificationError[] = [];
  for (const p of filePaths) {
    try {
      files.push(classifyFile(p, dictionary));
    } catch (e) {
      if (!(e instanceof ClassificationError)) throw e;
      failures.push(e);
    }
  }
  const first = failures[0];
  if (first) {
    const detail = failures.map((f) => f.message).join('; ');
    throw new ClassificationError(
      failures.length === 1
        ? first.message
        : `${failures.length} files could not be classified: ${detail}`,
      first.fileName
    );
  }
  return files;
}

export interface TableGroup {
  readonly tableName: TableName;
  readonly tableType: TableType;
  readonly files: readonly TableSourceFile[];
}

export interface TableInventory {
  readonly tables: readonly TableGroup[]; // ordinary tables to stack
  readonly labTables: readonly TableGroup[];
  readonly sidecars: Readonly<Record<SidecarCategory, readonly SidecarSourceFile[]>>;
}

// Plain code-unit order
export function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isLabType(tableType: TableType): boolean {
  return tableType === 'lab-current' || tableType === 'lab-all';
}

/** Separates lab tables and sidecars from the ordinary table set. */
export function buildInventory(files: readonly SourceFile[]): TableInventory {
  const groups = new Map<TableName, { tableType: TableType; files: TableSourceFile[] }>();
  const sidecars: Record<SidecarCategory, SidecarSourceFile[]> = {
    variables: [],
    validation: [],
    sensor_positions: [],
  };

  for (const f of files) {
    if (f.kind === 'sidecar') {
      sidecars[f.category].push(f);
      continue;
    }
    const group = groups.get(f.tableName);
    if (group) group.files.push(f);
    else groups.set(f.tableName, { tableType: f.tableType, files: [f] });
  }

  const tables: TableGroup[] = [];
  const labTables: TableGroup[] = [];
  const names = [...groups.keys()].sort();
  for (const tableName of names) {
    const group = groups.get(tableName);
    if (!group) continue;
    const entry: TableGroup = {
      tableName,
      tableType: group.tableType,
      files: [...group.files].sort((a, b) => compareOrdinal(a.path, b.path)),
    };
    (isLabType(group.tableType) ? labTables : tables).push(entry);
  }

  return { tables, labTables, sidecars };
}
