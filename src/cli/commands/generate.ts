/**
 * @arch testsmith.cli.command
 * @intent:cli-output
 */
import { Command, InvalidArgumentError } from 'commander';
import * as path from 'node:path';
import { loadConfig, toConfiguration } from '../../core/config/loader.js';
import { runBatch, type SourceInput } from '../../core/pipeline/batch.js';
import { writeOutputFiles, type WriteResult } from '../../core/pipeline/writer.js';
import { createFormatter } from '../formatters/index.js';
import { fileExists, globFiles, isDirectory, readFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

export interface GenerateOptions {
  out?: string;
  coverage?: string;
  maxLines?: number;
  includePrivate?: boolean;
  fixtures: boolean;
  parametrize: boolean;
  split: boolean;
  prefix?: string;
  config?: string;
  concurrency?: number;
  overwrite?: boolean;
  dryRun?: boolean;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Generate pytest files for Python sources')
    .argument('[paths...]', 'Python files, directories or glob patterns', ['.'])
    .option('-o, --out <dir>', 'Output directory (default: outputDir from config)')
    .option('-c, --coverage <level>', 'Coverage level: happyPath, comprehensive or full')
    .option('--max-lines <n>', 'Line budget per generated file', parsePositiveInt)
    .option('--include-private', 'Also test names starting with "_"')
    .option('--no-fixtures', 'Do not emit pytest fixtures')
    .option('--no-parametrize', 'Emit one test per symbol without tiered cases')
    .option('--no-split', 'Never split a module across several files')
    .option('--prefix <prefix>', 'Prefix for test files and functions')
    .option('--config <path>', 'Path to config file')
    .option('-j, --concurrency <n>', 'Files processed in parallel', parsePositiveInt)
    .option('--overwrite', 'Replace existing test files')
    .option('--dry-run', 'Report what would be written without writing')
    .option('--json', 'Output in JSON format')
    .option('-v, --verbose', 'Show debug output and every skipped symbol')
    .option('-q, --quiet', 'Only print warnings and errors')
    .action(async (paths: string[], options: GenerateOptions) => {
      try {
        await runGenerate(paths, options);
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

/** Only flags the user actually passed override the config file. */
function collectOverrides(options: GenerateOptions): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (options.coverage !== undefined) overrides.coverageLevel = options.coverage;
  if (options.maxLines !== undefined) overrides.maxLinesPerFile = options.maxLines;
  if (options.includePrivate) overrides.includePrivate = true;
  if (!options.fixtures) overrides.generateFixtures = false;
  if (!options.parametrize) overrides.generateParametrize = false;
  if (!options.split) overrides.splitLargeFiles = false;
  if (options.prefix !== undefined) overrides.testNamePrefix = options.prefix;
  return overrides;
}

/**
 * Resolve arguments to project-relative `.py` paths.
 * Directories and globs honour `exclude`; files named explicitly are always kept.
 */
export async function collectSources(
  projectRoot: string,
  targets: string[],
  exclude: string[]
): Promise<string[]> {
  const found = new Set<string>();

  for (const target of targets) {
    const absolute = path.resolve(projectRoot, target);
    if (await isDirectory(absolute)) {
      const files = await globFiles('**/*.py', { cwd: absolute, ignore: exclude });
      files.forEach((file) => found.add(file));
    } else if (await fileExists(absolute)) {
      found.add(absolute);
    } else {
      const files = await globFiles(target, { cwd: projectRoot, ignore: exclude });
      files.filter((file) => file.endsWith('.py')).forEach((file) => found.add(file));
    }
  }

  return [...found]
    .map((file) => path.relative(projectRoot, file).split(path.sep).join('/'))
    .sort();
}

async function runGenerate(targets: string[], options: GenerateOptions): Promise<void> {
  if (options.verbose) logger.setLevel('debug');
  else if (options.quiet || options.json) logger.setLevel('warn');

  const projectRoot = process.cwd();
  const project = await loadConfig(projectRoot, options.config);
  const config = toConfiguration(project, collectOverrides(options));
  const outDir = path.resolve(projectRoot, options.out ?? project.outputDir);

  const sources = await collectSources(projectRoot, targets, project.exclude);
  if (sources.length === 0) {
    logger.warn('No Python files found');
    return;
  }
  logger.debug(`Found ${sources.length} Python file(s)`);

  const inputs: SourceInput[] = sources.map((source) => ({
    path: source,
    load: () => readFile(path.resolve(projectRoot, source)),
  }));

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupted, finishing files in progress');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const batch = await runBatch(inputs, config, {
    concurrency: options.concurrency ?? project.concurrency,
    signal: controller.signal,
  }).finally(() => process.removeListener('SIGINT', onInterrupt));

  const writes: WriteResult = { written: [], skipped: [] };
  for (const result of batch.results) {
    if (result.status !== 'processed') continue;
    // Mirror the source layout so same-named modules in different packages don't collide
    const target = path.join(outDir, path.dirname(result.path));
    const written = await writeOutputFiles(result.files, target, {
      overwrite: options.overwrite,
      dryRun: options.dryRun,
    });
    writes.written.push(...written.written.map((file) => path.relative(projectRoot, file)));
    writes.skipped.push(...written.skipped.map((file) => path.relative(projectRoot, file)));
  }

  const formatter = createFormatter(options.json ?? false, { verbose: options.verbose });
  console.log(formatter.formatGeneration({ batch, writes, dryRun: options.dryRun ?? false }));
}
