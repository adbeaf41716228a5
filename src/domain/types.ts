// Brand types for compile-time safety on identities parsed out of file names
export type TableName = string & { readonly __brand: 'TableName' };
export type SiteCode = string & { readonly __brand: 'SiteCode' };
export type PublicationToken = string & {
  readonly __brand: 'PublicationToken';
};

// How files of one table are combined
export const TABLE_TYPES = [
  'site-date',
  'site-all',
  'lab-current',
  'lab-all',
  'other',
] as const;

export type TableType = (typeof TABLE_TYPES)[number];

export interface TableTypeEntry {
  readonly tableName: TableName;
  readonly tableType: TableType;
}

// Auxiliary artifacts that are copied or consolidated instead of stacked
export const SIDECAR_CATEGORIES = [
  'variables',
  'validation',
  'sensor_positions',
] as const;

export type SidecarCategory = (typeof SIDECAR_CATEGORIES)[number];

// HOR.VER.TMI triple carried by instrumented (sensor) data file names
export interface SensorLocation {
  readonly horizontal: string;
  readonly vertical: string;
  readonly temporalIndex: string;
}

export interface SourceFileBase {
  readonly path: string;
  readonly fileName: string;
  readonly domain: string;
  readonly site: SiteCode;
  readonly product: string;
  readonly location?: SensorLocation;
  readonly month?: string; // YYYY-MM
  readonly packageType?: 'basic' | 'expanded';
  readonly publication: PublicationToken;
}

export interface TableSourceFile extends SourceFileBase {
  readonly kind: 'table';
  readonly tableName: TableName;
  readonly tableType: TableType;
}

export interface SidecarSourceFile extends SourceFileBase {
  readonly kind: 'sidecar';
  readonly category: SidecarCategory;
}

export type SourceFile = TableSourceFile | SidecarSourceFile;

// Semantic column types declared by the variables file
export type DeclaredType = 'numeric' | 'integer' | 'timestamp' | 'string';

// null is the missing-value marker; it is written as an empty field
export type CellValue = string | number | Date | null;

export type StackedRow = Record<string, CellValue>;

export interface RowSet {
  readonly columns: readonly string[];
  readonly rows: readonly StackedRow[];
}

export interface StackedTable extends RowSet {
  readonly tableName: TableName;
  readonly fileCount: number;
}

export type FieldTypes = Readonly<Record<string, DeclaredType>>;

export type VariableDictionary = ReadonlyMap<TableName, FieldTypes>;

export interface CoercionWarning {
  readonly field: string;
  readonly declaredType: DeclaredType;
  readonly row: number; // 1-based, excluding header
  readonly value: string;
}

// Validation functions
export function isValidTableName(input: string): input is TableName {
  return /^[A-Za-z0-9][A-Za-z0-9_]*$/.test(input);
}

export function isValidSiteCode(input: string): input is SiteCode {
  return /^[A-Za-z0-9]{2,8}$/.test(input);
}

export function isValidPublicationToken(
  input: string
): input is PublicationToken {
  // YYYYMMDD or YYYYMMDDThhmmssZ; both sort chronologically as plain strings
  return /^\d{8}(?:T\d{6}Z)?$/.test(input);
}

export function isTableType(input: string): input is TableType {
  return TABLE_TYPES.some((t) => t === input);
}

export function isSidecarCategory(input: string): input is SidecarCategory {
  return SIDECAR_CATEGORIES.some((c) => c === input);
}

// Factory functions with validation
export function createTableName(input: string): TableName {
  if (!isValidTableName(input)) {
    throw new Error(
      `Invalid TableName format: ${input}. Must be letters, digits and underscores.`
    );
  }
  return input;
}

export function createSiteCode(input: string): SiteCode {
  if (!isValidSiteCode(input)) {
    throw new Error(
      `Invalid SiteCode format: ${input}. Must be 2-8 letters or digits.`
    );
  }
  return input;
}

export function createPublicationToken(input: string): PublicationToken {
  if (!isValidPublicationToken(input)) {
    throw new Error(
      `Invalid PublicationToken format: ${input}. Must be YYYYMMDD or YYYYMMDDThhmmssZ.`
    );
  }
  return input;
}
