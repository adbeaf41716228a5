import {
  DeclaredType,
  FieldTypes,
  TableName,
  VariableDictionary,
  isValidTableName,
} from '@domain/types';
import { ConfigurationError } from '@domain/errors';
import { RawTable, readDelimitedFile } from './csv-io';
import { stripPubSuffix } from './table-types';

const REQUIRED_COLUMNS = ['table', 'fieldName', 'dataType'];

// dataType values used by the variables file
export function toDeclaredType(dataType: string): DeclaredType {
  switch (dataType.trim().toLowerCase()) {
    case 'real':
      return 'numeric';
    case 'integer':
    case 'signed integer':
    case 'unsigned integer':
      return 'integer';
    case 'datetime':
      return 'timestamp';
    default:
      return 'string';
  }
}

export const EMPTY_VARIABLES: VariableDictionary = new Map();

export function buildVariableDictionary(raw: RawTable): VariableDictionary {
  const missing = REQUIRED_COLUMNS.filter((c) => !raw.columns.includes(c));
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Variables file is missing columns: ${missing.join(', ')}`
    );
  }

  const byTable = new Map<TableName, Record<string, DeclaredType>>();
  for (const r of raw.rows) {
    const table = stripPubSuffix((r['table'] ?? '').trim());
    const field = (r['fieldName'] ?? '').trim();
    if (!isValidTableName(table) || field === '') continue;
    const fields = byTable.get(table) ?? {};
    fields[field] = toDeclaredType(r['dataType'] ?? '');
    byTable.set(table, fields);
  }

  const frozen = new Map<TableName, FieldTypes>();
  for (const [table, fields] of byTable) frozen.set(table, Object.freeze(fields));
  return frozen;
}

export async function loadVariableDictionary(
  filePath: string
): Promise<VariableDictionary> {
  return buildVariableDictionary(await readDelimitedFile(filePath));
}

export function fieldTypesFor(
  dictionary: VariableDictionary,
  tableName: TableName
): FieldTypes {
  return dictionary.get(tableName) ?? {};
}
