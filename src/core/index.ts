/**
 * @arch testsmith.core.barrel
 */
export * from './model/types.js';
export * from './config/index.js';
export { analyze, isSyntaxAnalysisError } from './parser/analyzer.js';
export { toModuleName } from './parser/module-name.js';
export {
  classify,
  explainClassification,
  describeExclusion,
  type ClassificationEntry,
  type ExclusionReason,
} from './classifier/classifier.js';
export {
  createEnrichmentResolver,
  EnrichmentResolver,
  buildMock,
  type Enrichment,
} from './enrichment/resolver.js';
export { synthesizeCases, COVERAGE_TIERS } from './synthesis/synthesizer.js';
export { resolveBaseType, type BaseType } from './synthesis/type-resolver.js';
export {
  renderTestUnit,
  renderFixture,
  TestNameRegistry,
  type RenderContext,
} from './render/renderer.js';
export { packUnits, type PackingContext } from './packing/packer.js';
export {
  synthesize,
  synthesizeWithReport,
  type SynthesisReport,
  type SymbolSkip,
} from './pipeline/synthesize.js';
export {
  runBatch,
  defaultConcurrency,
  type SourceInput,
  type BatchOptions,
  type BatchResult,
  type BatchSummary,
  type FileResult,
  type SkipRecord,
} from './pipeline/batch.js';
export { writeOutputFiles, type WriteOptions, type WriteResult } from './pipeline/writer.js';
