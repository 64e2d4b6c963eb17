/**
 * @arch testsmith.cli.command
 * @intent:cli-output
 *
 * Shows what the parser and classifier see in a single file, without generating anything.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { analyze, isSyntaxAnalysisError } from '../../core/parser/analyzer.js';
import { explainClassification } from '../../core/classifier/classifier.js';
import { loadConfig } from '../../core/config/loader.js';
import { createFormatter } from '../formatters/index.js';
import { readFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

interface AnalyzeOptions {
  json?: boolean;
  includePrivate?: boolean;
  prefix?: string;
  config?: string;
}

/**
 * Create the analyze command.
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Show the declarations found in a Python file and which ones would be tested')
    .argument('<file>', 'Python source file')
    .option('--json', 'Output in JSON format')
    .option('--include-private', 'Treat names starting with "_" as candidates')
    .option('--prefix <prefix>', 'Test-name prefix used to recognise existing tests')
    .option('--config <path>', 'Path to config file')
    .action(async (file: string, options: AnalyzeOptions) => {
      try {
        await runAnalyze(file, options);
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

async function runAnalyze(file: string, options: AnalyzeOptions): Promise<void> {
  const projectRoot = process.cwd();
  const project = await loadConfig(projectRoot, options.config);
  const absolute = path.resolve(projectRoot, file);
  const logicalPath = path.relative(projectRoot, absolute).split(path.sep).join('/');

  const source = await readFile(absolute);
  const module = analyze(source, logicalPath);
  if (isSyntaxAnalysisError(module)) {
    throw module;
  }

  const classification = explainClassification(
    module,
    options.includePrivate ?? project.includePrivate,
    options.prefix ?? project.testNamePrefix
  );

  const formatter = createFormatter(options.json ?? false);
  console.log(formatter.formatModule({ module, classification }));
}
