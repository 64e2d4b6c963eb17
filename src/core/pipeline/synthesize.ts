/**
 * @arch testsmith.core.engine
 *
 * synthesize: ModuleModel + Configuration -> OutputFile[].
 * Classifier -> (enrichment, case synthesis) -> renderer -> packer.
 */
import type { Configuration } from '../config/schema.js';
import { createConfiguration } from '../config/loader.js';
import type { FunctionModel, GeneratedTestUnit, ModuleModel, OutputFile } from '../model/types.js';
import { describeExclusion, explainClassification } from '../classifier/classifier.js';
import { createEnrichmentResolver } from '../enrichment/resolver.js';
import { synthesizeCases } from '../synthesis/synthesizer.js';
import { renderTestUnit, TestNameRegistry, type RenderContext } from '../render/renderer.js';
import { packUnits } from '../packing/packer.js';
import { moduleBaseName } from '../parser/module-name.js';
import { TestsmithError } from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';

const log = rootLogger.child('synthesize');

export interface SymbolSkip {
  /** Qualified symbol name */
  symbol: string;
  line: number;
  reason: string;
  /** Error code, when the skip came from an error */
  code?: string;
}

export interface SynthesisReport {
  files: OutputFile[];
  /** Qualified names of candidates that produced a test unit, in order */
  tested: string[];
  /** Every symbol left out, ordered by source line */
  skipped: SymbolSkip[];
}

/**
 * Run classification through packing for one module, recording every skipped symbol.
 * Throws ConfigurationError before doing any work if the configuration is invalid.
 */
export function synthesizeWithReport(module: ModuleModel, config: Configuration): SynthesisReport {
  const cfg = createConfiguration(config, { allowUnknownKeys: true });

  const skipped: SymbolSkip[] = module.skipped.map((s) => ({
    symbol: s.name,
    line: s.line,
    reason: s.reason,
    code: s.code,
  }));

  const candidates: FunctionModel[] = [];
  for (const entry of explainClassification(module, cfg.includePrivate, cfg.testNamePrefix)) {
    if (entry.included) {
      candidates.push(entry.symbol);
    } else if (entry.reason) {
      skipped.push({
        symbol: entry.symbol.qualifiedName,
        line: entry.symbol.line,
        reason: `excluded: ${describeExclusion(entry.reason)}`,
      });
    }
  }

  const resolver = createEnrichmentResolver(module, { generateFixtures: cfg.generateFixtures });
  const context: RenderContext = {
    moduleName: module.moduleName,
    testNamePrefix: cfg.testNamePrefix,
    classes: module.classes,
    names: new TestNameRegistry(),
  };

  const units: GeneratedTestUnit[] = [];
  const tested: string[] = [];
  for (const candidate of candidates) {
    try {
      const { fixtures, mocks } = resolver.resolve(candidate);
      const parametrize = cfg.generateParametrize
        ? synthesizeCases(candidate, cfg.coverageLevel)
        : [];
      units.push(renderTestUnit(candidate, { fixtures, mocks, parametrize }, context));
      tested.push(candidate.qualifiedName);
    } catch (error) {
      if (!(error instanceof TestsmithError)) throw error;
      log.warn(`Skipping ${candidate.qualifiedName}: ${error.message}`);
      skipped.push({
        symbol: candidate.qualifiedName,
        line: candidate.line,
        reason: error.message,
        code: error.code,
      });
    }
  }

  const files = packUnits(units, {
    moduleName: module.moduleName,
    baseName: moduleBaseName(module.moduleName),
    testNamePrefix: cfg.testNamePrefix,
    maxLinesPerFile: cfg.maxLinesPerFile,
    splitLargeFiles: cfg.splitLargeFiles,
  });

  log.debug(`Synthesized ${module.sourcePath}`, {
    units: units.length,
    files: files.length,
    skipped: skipped.length,
  });

  return {
    files,
    tested,
    skipped: skipped.sort((a, b) => a.line - b.line),
  };
}

/**
 * Generate output files for one analyzed module.
 */
export function synthesize(module: ModuleModel, config: Configuration): OutputFile[] {
  return synthesizeWithReport(module, config).files;
}
