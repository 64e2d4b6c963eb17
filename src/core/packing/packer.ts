/**
 * @arch testsmith.core.engine
 *
 * File packer: greedy, order-preserving allocation of rendered units into
 * size-bounded output files.
 */
import type { FixtureSpec, GeneratedTestUnit, OutputFile } from '../model/types.js';
import { renderFixture } from '../render/renderer.js';
import { countLines, joinDefinitions } from '../render/python-source.js';

export interface PackingContext {
  /** Dotted module name, shown in the file docstring */
  moduleName: string;
  /** Output file stem, usually the module's last segment */
  baseName: string;
  testNamePrefix: string;
  maxLinesPerFile: number;
  splitLargeFiles: boolean;
}

/**
 * Fixtures deduplicated by name, first occurrence kept.
 */
export function dedupeFixtures(fixtures: FixtureSpec[]): FixtureSpec[] {
  const seen = new Map<string, FixtureSpec>();
  for (const fixture of fixtures) {
    if (!seen.has(fixture.name)) seen.set(fixture.name, fixture);
  }
  return [...seen.values()];
}

export function mergeImports(units: GeneratedTestUnit[]): string[] {
  return [...new Set(units.flatMap((u) => u.imports))].sort();
}

/**
 * Module docstring, import block and fixture definitions.
 */
export function renderHeader(
  moduleName: string,
  imports: string[],
  fixtures: FixtureSpec[]
): string {
  return (
    `"""Generated tests for ${moduleName}."""\n\n` +
    imports.map((line) => `${line}\n`).join('') +
    joinDefinitions(fixtures.map(renderFixture))
  );
}

function projectedLineCount(moduleName: string, units: GeneratedTestUnit[]): number {
  const header = renderHeader(
    moduleName,
    mergeImports(units),
    dedupeFixtures(units.flatMap((u) => u.fixtures))
  );
  return units.reduce((total, unit) => total + unit.lineCount, countLines(header));
}

function closeFile(path: string, moduleName: string, units: GeneratedTestUnit[]): OutputFile {
  const fixtures = dedupeFixtures(units.flatMap((u) => u.fixtures));
  const imports = mergeImports(units);
  const header = renderHeader(moduleName, imports, fixtures);
  const content = header + units.map((u) => u.body).join('');
  return {
    path,
    units,
    fixtures,
    imports,
    content,
    headerLineCount: countLines(header),
    lineCount: countLines(content),
  };
}

export function outputPath(context: PackingContext, index: number, total: number): string {
  const stem = `${context.testNamePrefix}${context.baseName}`;
  return total === 1 ? `${stem}.py` : `${stem}_${index + 1}.py`;
}

/**
 * Pack units in the given order. Before adding a unit, the current file is
 * closed if the projected line count (header included) would exceed the
 * budget and the file already holds a unit. A unit is never dropped; one that
 * alone exceeds the budget gets a file of its own.
 */
export function packUnits(units: GeneratedTestUnit[], context: PackingContext): OutputFile[] {
  const batches: GeneratedTestUnit[][] = [];
  let current: GeneratedTestUnit[] = [];

  for (const unit of units) {
    if (
      context.splitLargeFiles &&
      current.length > 0 &&
      projectedLineCount(context.moduleName, [...current, unit]) > context.maxLinesPerFile
    ) {
      batches.push(current);
      current = [];
    }
    current.push(unit);
  }
  if (current.length > 0) batches.push(current);

  return batches.map((batch, index) =>
    closeFile(outputPath(context, index, batches.length), context.moduleName, batch)
  );
}
