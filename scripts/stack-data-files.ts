#!/usr/bin/env tsx
// Stack an unpacked download folder into one file per table.
// Usage: stack-data-files <folder> [--cores <n>] [--force-parallel] [--table-types <csv>]
import * as path from 'path';
import { resolveStackOptions } from '../src/etl/config';
import { runStackDataFiles } from '../src/etl/stack-data-files';
import { TableTypeDictionary } from '../src/etl/table-types';
import { reportRunSummary } from '../src/application/run-summary';
import { isStackError } from '../src/domain/errors';

async function main(): Promise<void> {
  const options = resolveStackOptions(process.argv.slice(2), process.env);
  const tableTypes = await TableTypeDictionary.load(
    path.resolve(options.tableTypesCsv)
  );
  const summary = await runStackDataFiles({
    folder: path.resolve(options.folder),
    tableTypes,
    nCores: options.nCores,
    forceParallel: options.forceParallel,
  });
  reportRunSummary(summary);
}

main().catch((err: unknown) => {
  if (isStackError(err)) {
    console.error(`❌ Stacking failed (${err.kind}): ${err.message}`);
  } else {
    console.error('❌ Stacking failed:', err);
  }
  process.exit(1);
});
