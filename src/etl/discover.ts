import { promises as fsp } from 'fs';
import * as path from 'path';
import { OUTPUT_EXTENSION, STACKED_DIR_NAME } from './config';
import { compareOrdinal } from './file-classifier';

/**
 * Lists the delimited data files under an unpacked download, descending into
 * per-site/per-month folders and skipping any earlier stacked output.
 */
export async function findDataFiles(folder: string): Promise<string[]> {
  const found: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await fsp.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name !== STACKED_DIR_NAME) await walk(full);
      } else if (
        entry.isFile() &&
        entry.name.toLowerCase().endsWith(`.${OUTPUT_EXTENSION}`)
      ) {
        found.push(full);
      }
    }
  };
  await walk(folder);
  return found.sort(compareOrdinal);
}
