/**
 * @arch testsmith.core.engine
 *
 * Multi-file batch runner. Files are independent: each runs the full
 * pipeline on its own, a failure is recorded against that file only, and
 * cancellation stops new files from starting while files in flight finish.
 */
import * as os from 'node:os';
import type { Configuration } from '../config/schema.js';
import { createConfiguration } from '../config/loader.js';
import type { OutputFile } from '../model/types.js';
import { analyze, isSyntaxAnalysisError } from '../parser/analyzer.js';
import { synthesizeWithReport, type SymbolSkip } from './synthesize.js';
import {
  ConfigurationError,
  ErrorCodes,
  TestsmithError,
  getErrorMessage,
} from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';

const log = rootLogger.child('batch');

export const CANCELLED_REASON = 'cancelled';

/** One source unit. The loader performs the I/O, so the pipeline needs none. */
export interface SourceInput {
  /** Logical path; also used to derive the module's import name */
  path: string;
  load(): Promise<string>;
}

export interface BatchOptions {
  /** Files processed in parallel (default: 75% of CPUs, min 2, max 16) */
  concurrency?: number;
  signal?: AbortSignal;
}

export type FileResult =
  | {
      status: 'processed';
      path: string;
      files: OutputFile[];
      tested: string[];
      symbolSkips: SymbolSkip[];
    }
  | {
      status: 'skipped';
      path: string;
      reason: string;
      code?: string;
    };

export interface BatchSummary {
  filesProcessed: number;
  filesSkipped: number;
  symbolsTested: number;
  symbolsSkipped: number;
}

export interface SkipRecord {
  /** File path, or `path::Symbol` for a skipped symbol */
  path: string;
  reason: string;
}

export interface BatchResult {
  /** One entry per input, in input order */
  results: FileResult[];
  summary: BatchSummary;
  skips: SkipRecord[];
}

export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

function skippedFile(path: string, reason: string, code?: string): FileResult {
  return code ? { status: 'skipped', path, reason, code } : { status: 'skipped', path, reason };
}

async function processFile(input: SourceInput, config: Configuration): Promise<FileResult> {
  let source: string;
  try {
    source = await input.load();
  } catch (error) {
    log.warn(`Could not read ${input.path}: ${getErrorMessage(error)}`);
    return skippedFile(input.path, `read failed: ${getErrorMessage(error)}`, ErrorCodes.FILE_READ_ERROR);
  }

  try {
    const analyzed = analyze(source, input.path);
    if (isSyntaxAnalysisError(analyzed)) {
      log.warn(analyzed.message);
      return skippedFile(input.path, analyzed.message, analyzed.code);
    }

    const report = synthesizeWithReport(analyzed, config);
    return {
      status: 'processed',
      path: input.path,
      files: report.files,
      tested: report.tested,
      symbolSkips: report.skipped,
    };
  } catch (error) {
    // Bulkhead: a failure in one file never reaches its siblings
    log.warn(`Failed to process ${input.path}: ${getErrorMessage(error)}`);
    return skippedFile(
      input.path,
      getErrorMessage(error),
      error instanceof TestsmithError ? error.code : undefined
    );
  }
}

export function summarize(results: FileResult[]): { summary: BatchSummary; skips: SkipRecord[] } {
  const summary: BatchSummary = {
    filesProcessed: 0,
    filesSkipped: 0,
    symbolsTested: 0,
    symbolsSkipped: 0,
  };
  const skips: SkipRecord[] = [];

  for (const result of results) {
    if (result.status === 'skipped') {
      summary.filesSkipped++;
      skips.push({ path: result.path, reason: result.reason });
      continue;
    }
    summary.filesProcessed++;
    summary.symbolsTested += result.tested.length;
    summary.symbolsSkipped += result.symbolSkips.length;
    for (const skip of result.symbolSkips) {
      skips.push({ path: `${result.path}::${skip.symbol}`, reason: skip.reason });
    }
  }

  return { summary, skips };
}

/**
 * Apply the pipeline to every input with a bounded pool of workers.
 * Configuration is validated before any file starts.
 */
export async function runBatch(
  inputs: SourceInput[],
  config: Configuration,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const cfg = createConfiguration(config, { allowUnknownKeys: true });
  const concurrency = options.concurrency ?? defaultConcurrency();
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid concurrency: ${concurrency}`,
      { concurrency }
    );
  }

  const results = new Array<FileResult | undefined>(inputs.length).fill(undefined);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < inputs.length) {
      if (options.signal?.aborted) return;
      const index = next++;
      results[index] = await processFile(inputs[index], cfg);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, inputs.length) }, worker);
  const settled = await Promise.allSettled(workers);
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      log.error('Batch worker failed', { error: getErrorMessage(outcome.reason) });
    }
  }

  const completed = inputs.map(
    (input, index) => results[index] ?? skippedFile(input.path, CANCELLED_REASON)
  );
  const { summary, skips } = summarize(completed);
  log.debug('Batch finished', { ...summary });

  return { results: completed, summary, skips };
}
