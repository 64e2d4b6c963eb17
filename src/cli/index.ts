/**
 * @arch testsmith.cli.barrel
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createGenerateCommand } from './commands/generate.js';
import { createAnalyzeCommand } from './commands/analyze.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('testsmith')
    .description('Generate pytest scaffolding from Python source')
    .version(readVersion());
  [createGenerateCommand, createAnalyzeCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
