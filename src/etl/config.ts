// Centralized stacking configuration: output locations, canonical names and
// the thresholds the run policy relies on. Tests and the CLI share these.
import { ConfigurationError } from '@domain/errors';

export const STACKED_DIR_NAME = 'stackedFiles';
export const OUTPUT_EXTENSION = 'csv';

// Aggregate input size (bytes) above which stacking spreads across every core
export const AUTO_PARALLEL_THRESHOLD_BYTES = 25000;

// Paths containing these are never counted toward the aggregate input size
export const SIZE_EXCLUDE_PATTERN = /stacked|\.zip$/i;

export const DEFAULT_TABLE_TYPES_CSV = 'data/reference/table_types.csv';

// Canonical output names for sidecar artifacts
export const VARIABLES_OUTPUT = `variables.${OUTPUT_EXTENSION}`;
export const VALIDATION_OUTPUT = `validation.${OUTPUT_EXTENSION}`;
export const SENSOR_POSITIONS_OUTPUT = `sensor_positions.${OUTPUT_EXTENSION}`;

// Columns joined from the consolidated sensor position table onto sensor rows
export const POSITION_JOIN_COLUMNS = [
  'referenceLatitude',
  'referenceLongitude',
  'referenceElevation',
  'xOffset',
  'yOffset',
  'zOffset',
] as const;

export function tableOutputFile(tableName: string): string {
  return `${tableName}.${OUTPUT_EXTENSION}`;
}

export interface StackCliOptions {
  readonly folder: string;
  readonly nCores: number;
  readonly forceParallel: boolean;
  readonly tableTypesCsv: string;
}

const TRUTHY = new Set(['1', 'true', 'yes']);
const FALSY = new Set(['0', 'false', 'no', '']);

function parseCores(raw: string): number {
  if (!/^\d+$/.test(raw) || Number.parseInt(raw, 10) < 1) {
    throw new ConfigurationError(
      `Invalid core count: ${raw}. Must be a positive integer.`
    );
  }
  return Number.parseInt(raw, 10);
}

function parseFlag(raw: string, name: string): boolean {
  const v = raw.trim().toLowerCase();
  if (TRUTHY.has(v)) return true;
  if (FALSY.has(v)) return false;
  throw new ConfigurationError(`Invalid value for ${name}: ${raw}`);
}

function envString(env: Record<string, unknown>, key: string): string | null {
  const raw = env[key];
  return typeof raw === 'string' && raw.trim() !== '' ? raw.trim() : null;
}

/**
 * Resolves CLI options from arguments first, then environment, then defaults.
 * Recognised arguments: `<folder>`, `--cores <n>` / `--cores=<n>`,
 * `--force-parallel`, `--table-types <csv>`.
 */
export function resolveStackOptions(
  argv: readonly string[],
  env: Record<string, unknown>
): StackCliOptions {
  let folder = envString(env, 'STACK_FOLDER');
  let cores = envString(env, 'STACK_CORES');
  const forceRaw = envString(env, 'STACK_FORCE_PARALLEL');
  let forceParallel = forceRaw ? parseFlag(forceRaw, 'STACK_FORCE_PARALLEL') : false;
  let tableTypesCsv = envString(env, 'TABLE_TYPES_CSV') ?? DEFAULT_TABLE_TYPES_CSV;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--force-parallel') {
      forceParallel = true;
    } else if (arg === '--cores' || arg === '--table-types') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new ConfigurationError(`Missing value for ${arg}`);
      }
      if (arg === '--cores') cores = value;
      else tableTypesCsv = value;
      i++;
    } else if (arg.startsWith('--cores=')) {
      cores = arg.slice('--cores='.length);
    } else if (arg.startsWith('--table-types=')) {
      tableTypesCsv = arg.slice('--table-types='.length);
    } else if (arg.startsWith('--')) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    } else {
      folder = arg;
    }
  }

  if (!folder) {
    throw new ConfigurationError(
      'No data folder given. Pass it as the first argument or set STACK_FOLDER.'
    );
  }

  return {
    folder,
    nCores: cores === null ? 1 : parseCores(cores),
    forceParallel,
    tableTypesCsv,
  };
}
