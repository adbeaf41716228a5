import {
  TableName,
  TableType,
  TableTypeEntry,
  createTableName,
  isTableType,
  isValidTableName,
} from '@domain/types';
import { ConfigurationError } from '@domain/errors';
import { parseDelimited, readDelimitedFile, RawTable } from './csv-io';

export interface RawTableTypeEntry {
  readonly tableName: string;
  readonly tableType: string;
}

// Published tables sometimes carry a _pub suffix that the dictionary omits
export function stripPubSuffix(name: string): string {
  return name.replace(/_pub$/, '');
}

/**
 * Read-only lookup from table name to table type. Built once per run and
 * shared by reference; nothing mutates it after construction.
 */
export class TableTypeDictionary {
  private readonly byName: ReadonlyMap<TableName, TableType>;

  private constructor(byName: ReadonlyMap<TableName, TableType>) {
    this.byName = byName;
  }

  static fromEntries(
    entries: readonly RawTableTypeEntry[]
  ): TableTypeDictionary {
    const byName = new Map<TableName, TableType>();
    entries.forEach((e, idx) => {
      const name = e.tableName.trim();
      const type = e.tableType.trim();
      if (!isValidTableName(name)) {
        throw new ConfigurationError(
          `Table type entry ${idx + 1}: invalid table name '${e.tableName}'`
        );
      }
      if (!isTableType(type)) {
        throw new ConfigurationError(
          `Table type entry ${idx + 1}: unknown table type '${e.tableType}' for ${name}`
        );
      }
      const existing = byName.get(name);
      if (existing !== undefined && existing !== type) {
        throw new ConfigurationError(
          `Table ${name} is listed as both ${existing} and ${type}`
        );
      }
      byName.set(name, type);
    });
    return new TableTypeDictionary(byName);
  }

  static fromRawTable(table: RawTable): TableTypeDictionary {
    const missing = ['tableName', 'tableType'].filter(
      (c) => !table.columns.includes(c)
    );
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Table type dictionary is missing columns: ${missing.join(', ')}`
      );
    }
    return TableTypeDictionary.fromEntries(
      table.rows.map((r) => ({
        tableName: r['tableName'] ?? '',
        tableType: r['tableType'] ?? '',
      }))
    );
  }

  static parse(csvContent: string): TableTypeDictionary {
    return TableTypeDictionary.fromRawTable(parseDelimited(csvContent));
  }

  static async load(filePath: string): Promise<TableTypeDictionary> {
    return TableTypeDictionary.fromRawTable(await readDelimitedFile(filePath));
  }

  get size(): number {
    return this.byName.size;
  }

  /** Resolves a name as it appears in a file name (a _pub suffix is ignored). */
  lookup(name: string): TableTypeEntry | null {
    const stripped = stripPubSuffix(name);
    if (!isValidTableName(stripped)) return null;
    const tableType = this.byName.get(stripped);
    return tableType === undefined
      ? null
      : { tableName: createTableName(stripped), tableType };
  }
}
