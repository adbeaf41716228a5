import { promises as fsp } from 'fs';
import * as path from 'path';
import { SidecarSourceFile, createTableName } from '@domain/types';
import { RunEvent } from '@application/run-summary';
import {
  SENSOR_POSITIONS_OUTPUT,
  VALIDATION_OUTPUT,
  VARIABLES_OUTPUT,
} from './config';
import { readDelimitedFile, writeDelimitedFile } from './csv-io';
import { TableGroup, TableInventory } from './file-classifier';
import { latestPerSite, mostRecent, selectTableFiles } from './file-selection';
import { PositionRecord, enrichPositionTable } from './position-enricher';
import { UnionResult, outerUnion } from './row-union';

export type SidecarEvent = Extract<
  RunEvent,
  { type: 'sidecar-copied' } | { type: 'lab-table-copied' }
>;

export interface SidecarPlan {
  readonly variables: SidecarSourceFile | null;
  readonly validation: SidecarSourceFile | null;
  readonly sensorPositions: readonly SidecarSourceFile[]; // newest per site
  readonly labTables: readonly TableGroup[];
}

export interface PositionTable {
  readonly union: UnionResult;
  readonly records: readonly PositionRecord[];
  readonly sources: readonly string[];
}

/** Picks the single most recent file of each sidecar category. */
export function planSidecars(inventory: TableInventory): SidecarPlan {
  return {
    variables: mostRecent(inventory.sidecars.variables),
    validation: mostRecent(inventory.sidecars.validation),
    sensorPositions: latestPerSite(inventory.sidecars.sensor_positions),
    labTables: inventory.labTables,
  };
}

async function copyRenamed(
  file: SidecarSourceFile,
  outputDir: string,
  outputName: string
): Promise<SidecarEvent> {
  const outputPath = path.join(outputDir, outputName);
  await fsp.copyFile(file.path, outputPath);
  return {
    type: 'sidecar-copied',
    category: file.category,
    sources: [file.fileName],
    outputPath,
  };
}

/**
 * Reads the newest position file of every site, tags each with its site and
 * unions them into one table covering all sites.
 */
export async function loadPositionTable(
  files: readonly SidecarSourceFile[]
): Promise<PositionTable | null> {
  if (files.length === 0) return null;
  const perSite = await Promise.all(
    files.map(async (f) => {
      const raw = await readDelimitedFile(f.path);
      return { file: f, ...enrichPositionTable(raw.columns, raw.rows, f.site) };
    })
  );
  const union = outerUnion(
    createTableName('sensor_positions'),
    perSite.map((p) => ({ source: p.file.fileName, columns: p.columns, rows: p.rows }))
  );
  return {
    union,
    records: perSite.flatMap((p) => p.rows),
    sources: files.map((f) => f.fileName),
  };
}

export async function writePositionTable(
  positions: PositionTable,
  outputDir: string
): Promise<SidecarEvent> {
  const outputPath = path.join(outputDir, SENSOR_POSITIONS_OUTPUT);
  await writeDelimitedFile(outputPath, positions.union.table);
  return {
    type: 'sidecar-copied',
    category: 'sensor_positions',
    sources: positions.sources,
    outputPath,
  };
}

/** Copies the newest publication per lab, keeping the original file name. */
export async function copyLabTables(
  labTables: readonly TableGroup[],
  outputDir: string
): Promise<SidecarEvent[]> {
  const copies = labTables.flatMap((group) =>
    selectTableFiles(group).files.map((file) => ({ group, file }))
  );
  return Promise.all(
    copies.map(async ({ group, file }): Promise<SidecarEvent> => {
      const outputPath = path.join(outputDir, file.fileName);
      await fsp.copyFile(file.path, outputPath);
      return {
        type: 'lab-table-copied',
        tableName: group.tableName,
        labId: file.site,
        source: file.fileName,
        outputPath,
      };
    })
  );
}

/**
 * Copies or consolidates every sidecar category present. Missing categories
 * are skipped. The position table is loaded beforehand by the caller because
 * sensor rows are joined against it.
 */
export async function copySidecars(
  plan: SidecarPlan,
  positions: PositionTable | null,
  outputDir: string
): Promise<SidecarEvent[]> {
  const pending: Promise<SidecarEvent | SidecarEvent[]>[] = [];
  pending.push(copyLabTables(plan.labTables, outputDir));
  if (plan.variables) pending.push(copyRenamed(plan.variables, outputDir, VARIABLES_OUTPUT));
  if (plan.validation) pending.push(copyRenamed(plan.validation, outputDir, VALIDATION_OUTPUT));
  if (positions) pending.push(writePositionTable(positions, outputDir));
  return (await Promise.all(pending)).flat();
}
