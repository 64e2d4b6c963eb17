/**
 * @arch testsmith.cli.formatter
 */
import chalk from 'chalk';
import type { FunctionModel, ParameterModel } from '../../core/model/types.js';
import { describeExclusion } from '../../core/classifier/classifier.js';
import type { FormatOptions, GenerationReport, IFormatter, ModuleReport } from './types.js';

type Color = 'green' | 'red' | 'yellow' | 'cyan' | 'dim' | 'bold';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatGeneration(report: GenerationReport): string {
    const { batch, writes, dryRun } = report;
    const { summary } = batch;
    const lines: string[] = [];

    lines.push(this.colorize('Generation summary', 'bold'));
    lines.push(`  Files processed:  ${summary.filesProcessed}`);
    lines.push(`  Files skipped:    ${summary.filesSkipped}`);
    lines.push(`  Symbols tested:   ${summary.symbolsTested}`);
    lines.push(`  Symbols skipped:  ${summary.symbolsSkipped}`);

    const verb = dryRun ? 'Would write' : 'Wrote';
    lines.push('');
    lines.push(this.colorize(`${verb} ${writes.written.length} test file(s)`, 'green'));
    for (const file of writes.written) {
      lines.push(`  ${file}`);
    }
    if (writes.skipped.length > 0) {
      lines.push(this.colorize(`Kept ${writes.skipped.length} existing file(s) (use --overwrite)`, 'yellow'));
      for (const file of writes.skipped) {
        lines.push(`  ${file}`);
      }
    }

    // Symbol skips are routine (private helpers, dunders); only list them in verbose mode
    const skips = this.options.verbose
      ? batch.skips
      : batch.skips.filter((skip) => !skip.path.includes('::'));
    if (skips.length > 0) {
      lines.push('');
      lines.push(this.colorize('Skipped:', 'yellow'));
      for (const skip of skips) {
        lines.push(`  ${skip.path}: ${this.colorize(skip.reason, 'dim')}`);
      }
    }

    return lines.join('\n');
  }

  formatModule(report: ModuleReport): string {
    const { module, classification } = report;
    const lines: string[] = [];

    lines.push(`${this.colorize(module.moduleName, 'bold')} (${module.sourcePath})`);
    if (module.dependencies.length > 0) {
      lines.push(`  Dependencies: ${module.dependencies.join(', ')}`);
    }

    lines.push('');
    for (const entry of classification) {
      const marker = entry.included
        ? this.colorize('✓', 'green')
        : this.colorize('-', 'dim');
      const suffix = entry.reason
        ? this.colorize(` (${describeExclusion(entry.reason)})`, 'dim')
        : '';
      lines.push(`  ${marker} ${this.describeSymbol(entry.symbol)}${suffix}`);
    }

    if (module.skipped.length > 0) {
      lines.push('');
      lines.push(this.colorize('Unsupported:', 'yellow'));
      for (const skip of module.skipped) {
        lines.push(`  line ${skip.line} ${skip.name}: ${skip.reason}`);
      }
    }

    return lines.join('\n');
  }

  private describeSymbol(fn: FunctionModel): string {
    const params = fn.parameters.map(formatParameter).join(', ');
    const returns = fn.returnType ? ` -> ${fn.returnType}` : '';
    const role = fn.role === 'Plain' ? '' : this.colorize(` [${fn.role}]`, 'cyan');
    const prefix = fn.isAsync ? 'async ' : '';
    return `${prefix}${fn.qualifiedName}(${params})${returns}${role}`;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) return text;
    return chalk[color](text);
  }
}

function formatParameter(p: ParameterModel): string {
  const star = p.kind === 'varargs' ? '*' : p.kind === 'kwargs' ? '**' : '';
  const type = p.declaredType ? `: ${p.declaredType}` : '';
  const value = p.defaultValue !== undefined ? ` = ${p.defaultValue}` : '';
  return `${star}${p.name}${type}${value}`;
}
