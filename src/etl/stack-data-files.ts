import { promises as fsp } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { VariableDictionary } from '@domain/types';
import { ConfigurationError, MergeError } from '@domain/errors';
import {
  PoolSizedEvent,
  RunSummary,
  TableStackedEvent,
  StackLogger,
  consoleLogger,
  describePoolDecision,
} from '@application/run-summary';
import {
  InlinePool,
  TaskPool,
  ThreadPool,
  threadWorkerFactory,
  withTaskPool,
} from '@infrastructure/worker-pool';
import { STACKED_DIR_NAME, tableOutputFile } from './config';
import { writeDelimitedFile } from './csv-io';
import { findDataFiles } from './discover';
import { TableGroup, buildInventory, classifyFiles } from './file-classifier';
import { selectTableFiles } from './file-selection';
import {
  LoadFileTask,
  LoadedFile,
  isLoadedFile,
  loadSourceFile,
} from './load-source-file';
import { assertCoresAvailable, decidePoolSize, measureCandidateBytes } from './pool-sizing';
import { PositionRecord } from './position-enricher';
import { outerUnion } from './row-union';
import { PositionTable, copySidecars, loadPositionTable, planSidecars } from './sidecar-copier';
import { TableTypeDictionary } from './table-types';
import { EMPTY_VARIABLES, fieldTypesFor, loadVariableDictionary } from './variables';

export type LoadPool = TaskPool<LoadFileTask, LoadedFile>;

export interface StackDataFilesOptions {
  readonly folder: string;
  readonly tableTypes: TableTypeDictionary;
  readonly nCores?: number; // default 1
  readonly forceParallel?: boolean; // default false
  // Already-discovered file paths; the folder is scanned when omitted
  readonly filePaths?: readonly string[];
  readonly availableCores?: number;
  readonly logger?: StackLogger;
  readonly createPool?: (workers: number) => LoadPool;
}

const STACK_WORKER_URL = new URL(
  '../infrastructure/stack-worker-bootstrap.mjs',
  import.meta.url
);

export function createLoadPool(workers: number): LoadPool {
  if (workers <= 1) return new InlinePool(loadSourceFile);
  return new ThreadPool({
    size: workers,
    createWorker: threadWorkerFactory<LoadFileTask>(STACK_WORKER_URL),
    isResult: isLoadedFile,
  });
}

interface StackContext {
  readonly pool: LoadPool;
  readonly variables: VariableDictionary;
  readonly positions: PositionTable | null;
  readonly outputDir: string;
  readonly logger: StackLogger;
}

function positionsForSite(
  positions: PositionTable | null,
  site: string
): PositionRecord[] | null {
  if (!positions) return null;
  return positions.records.filter((p) => p['siteID'] === site);
}

/**
 * Stacks one table: selects its files, loads them through the pool, unions the
 * row sets in selection order and writes `<table>.csv`.
 */
async function stackTable(
  group: TableGroup,
  ctx: StackContext
): Promise<TableStackedEvent> {
  const selection = selectTableFiles(group);
  if (selection.mode !== 'stack') {
    throw new MergeError(`Table ${group.tableName} is not stackable`, group.tableName);
  }
  ctx.logger.info(`Stacking table ${group.tableName}`);

  const fieldTypes = fieldTypesFor(ctx.variables, group.tableName);
  const loaded = await Promise.all(
    selection.files.map((file) =>
      ctx.pool.run({
        file,
        fieldTypes,
        positions: file.location ? positionsForSite(ctx.positions, file.site) : null,
      })
    )
  );

  const { table, stats } = outerUnion(group.tableName, loaded);
  const outputPath = path.join(ctx.outputDir, tableOutputFile(group.tableName));
  await writeDelimitedFile(outputPath, table);

  return {
    type: 'table-stacked',
    tableName: group.tableName,
    fileCount: stats.fileCount,
    rowCount: stats.rowCount,
    columnCount: stats.columnCount,
    coercionFailures: loaded.reduce((n, f) => n + f.coercionFailures, 0),
    outputPath,
  };
}

/**
 * Consolidates a folder of per-site, per-date data files into one file per
 * table under `<folder>/stackedFiles`.
 *
 * Classification of every file happens before any output is written; a file
 * that cannot be classified, a worker count above the machine's cores, or a
 * table that cannot be unioned aborts the run. The worker pool is closed on
 * every exit path.
 */
export async function runStackDataFiles(
  options: StackDataFilesOptions
): Promise<RunSummary> {
  const startedAt = Date.now();
  const logger = options.logger ?? consoleLogger;
  const nCores = options.nCores ?? 1;
  const availableCores = options.availableCores ?? os.availableParallelism();
  assertCoresAvailable(nCores, availableCores);

  const filePaths = options.filePaths ?? (await findDataFiles(options.folder));
  if (filePaths.length === 0) {
    throw new ConfigurationError('No data files are present in specified file path.');
  }
  const outputDir = path.join(options.folder, STACKED_DIR_NAME);

  const only = filePaths.length === 1 ? filePaths[0] : undefined;
  if (only !== undefined) {
    await fsp.mkdir(outputDir, { recursive: true });
    const outputPath = path.join(outputDir, path.basename(only));
    await fsp.copyFile(only, outputPath);
    return {
      folder: options.folder,
      outputDir,
      fileCount: 1,
      tableCount: 0,
      coercionFailures: 0,
      events: [{ type: 'single-file-copied', source: path.basename(only), outputPath }],
      elapsedMs: Date.now() - startedAt,
    };
  }

  const inventory = buildInventory(classifyFiles(filePaths, options.tableTypes));

  const decision = await decidePoolSize({
    nCores,
    forceParallel: options.forceParallel ?? false,
    availableCores,
    measureBytes: () => measureCandidateBytes(options.folder, filePaths),
  });
  const poolEvent: PoolSizedEvent = { type: 'pool-sized', ...decision };
  logger.info(describePoolDecision(poolEvent));

  await fsp.mkdir(outputDir, { recursive: true });

  const plan = planSidecars(inventory);
  const variables = plan.variables
    ? await loadVariableDictionary(plan.variables.path)
    : EMPTY_VARIABLES;
  const positions = await loadPositionTable(plan.sensorPositions);

  const pool = (options.createPool ?? createLoadPool)(decision.workers);
  const [sidecarEvents, tableEvents] = await withTaskPool(pool, (p) => {
    const ctx: StackContext = { pool: p, variables, positions, outputDir, logger };
    return Promise.all([
      copySidecars(plan, positions, outputDir),
      Promise.all(inventory.tables.map((group) => stackTable(group, ctx))),
    ]);
  }, { logger });

  return {
    folder: options.folder,
    outputDir,
    fileCount: filePaths.length,
    tableCount: tableEvents.length,
    coercionFailures: tableEvents.reduce((n, e) => n + e.coercionFailures, 0),
    events: [poolEvent, ...sidecarEvents, ...tableEvents],
    elapsedMs: Date.now() - startedAt,
  };
}
