/**
 * @arch testsmith.infra.fs
 *
 * Persists generated output files.
 */
import * as path from 'node:path';
import type { OutputFile } from '../model/types.js';
import { fileExists, writeFile } from '../../utils/file-system.js';

export interface WriteOptions {
  /** Replace files that already exist */
  overwrite?: boolean;
  /** Report what would be written without touching the disk */
  dryRun?: boolean;
}

export interface WriteResult {
  written: string[];
  /** Existing files left untouched */
  skipped: string[];
}

/**
 * Write each file's content to `outDir/<file.path>`.
 */
export async function writeOutputFiles(
  files: OutputFile[],
  outDir: string,
  options: WriteOptions = {}
): Promise<WriteResult> {
  const result: WriteResult = { written: [], skipped: [] };

  for (const file of files) {
    const target = path.join(outDir, file.path);
    if (!options.overwrite && (await fileExists(target))) {
      result.skipped.push(target);
      continue;
    }
    if (!options.dryRun) {
      await writeFile(target, file.content);
    }
    result.written.push(target);
  }

  return result;
}
