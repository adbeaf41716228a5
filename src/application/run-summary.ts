import * as path from 'path';
import { SidecarCategory, SiteCode, TableName } from '@domain/types';

// Discrete records of what a run did, rendered by a reporter afterwards
export type RunEvent =
  | {
      readonly type: 'pool-sized';
      readonly workers: number;
      readonly reason: 'forced' | 'auto-parallel' | 'below-threshold';
      readonly aggregateBytes?: number;
    }
  | {
      readonly type: 'table-stacked';
      readonly tableName: TableName;
      readonly fileCount: number;
      readonly rowCount: number;
      readonly columnCount: number;
      readonly coercionFailures: number;
      readonly outputPath: string;
    }
  | {
      readonly type: 'lab-table-copied';
      readonly tableName: TableName;
      readonly labId: SiteCode;
      readonly source: string;
      readonly outputPath: string;
    }
  | {
      readonly type: 'sidecar-copied';
      readonly category: SidecarCategory;
      readonly sources: readonly string[];
      readonly outputPath: string;
    }
  | {
      readonly type: 'single-file-copied';
      readonly source: string;
      readonly outputPath: string;
    };

export type PoolSizedEvent = Extract<RunEvent, { type: 'pool-sized' }>;
export type TableStackedEvent = Extract<RunEvent, { type: 'table-stacked' }>;

export interface RunSummary {
  readonly folder: string;
  readonly outputDir: string;
  readonly fileCount: number; // data files discovered
  readonly tableCount: number; // tables stacked
  readonly coercionFailures: number;
  readonly events: readonly RunEvent[];
  readonly elapsedMs: number;
}

export interface StackLogger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: StackLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
};

export const silentLogger: StackLogger = {
  info: () => undefined,
  warn: () => undefined,
};

export function formatDuration(ms: number): string {
  const secs = ms / 1000;
  if (secs < 60) return `${secs.toFixed(2)} secs`;
  if (secs < 3600) return `${(secs / 60).toFixed(2)} mins`;
  return `${(secs / 3600).toFixed(2)} hours`;
}

const SIDECAR_LABELS: Record<SidecarCategory, string> = {
  variables: 'variable definition file',
  validation: 'validation file',
  sensor_positions: 'sensor position file',
};

export function describePoolDecision(event: PoolSizedEvent): string {
  switch (event.reason) {
    case 'forced':
      return `Stacking across ${event.workers} cores (parallel execution forced).`;
    case 'auto-parallel':
      return `Parallelizing stacking operation across ${event.workers} cores.`;
    case 'below-threshold':
      return `File requirements do not meet the threshold for automatic parallelization, please see forceParallel to run stacking operation across multiple cores. Running on ${event.workers === 1 ? 'single core' : `${event.workers} cores`}.`;
  }
}

/**
 * Renders the end-of-run report: totals, the sidecar/lab copy notices
 * gathered during the run, coercion warnings, and elapsed time.
 */
export function renderRunSummary(summary: RunSummary): string[] {
  const single = summary.events.find(
    (e): e is Extract<RunEvent, { type: 'single-file-copied' }> =>
      e.type === 'single-file-copied'
  );
  const lines: string[] = [];
  if (single) {
    lines.push(`Only one data file found; copied ${single.source} to ${summary.outputDir}`);
  } else {
    lines.push(
      `Finished: All of the data are stacked into ${summary.tableCount} tables!`
    );
  }

  for (const e of summary.events) {
    if (e.type === 'lab-table-copied') {
      lines.push(
        `Copied the most recent publication of ${e.source} to /stackedFiles`
      );
    } else if (e.type === 'sidecar-copied') {
      lines.push(
        `Copied the most recent publication of ${SIDECAR_LABELS[e.category]} to /stackedFiles and renamed as ${path.basename(e.outputPath)}`
      );
    }
  }

  if (summary.coercionFailures > 0) {
    const tables = summary.events.flatMap((e) =>
      e.type === 'table-stacked' && e.coercionFailures > 0
        ? [`${e.tableName} (${e.coercionFailures})`]
        : []
    );
    lines.push(
      `${summary.coercionFailures} values could not be converted to their declared type and were left empty: ${tables.join(', ')}`
    );
  }

  lines.push(`Stacking took ${formatDuration(summary.elapsedMs)}`);
  return lines;
}

export function reportRunSummary(
  summary: RunSummary,
  logger: StackLogger = consoleLogger
): void {
  for (const line of renderRunSummary(summary)) logger.info(line);
}
