/**
 * @arch testsmith.cli.types
 */
import type { BatchResult } from '../../core/pipeline/batch.js';
import type { WriteResult } from '../../core/pipeline/writer.js';
import type { ModuleModel } from '../../core/model/types.js';
import type { ClassificationEntry } from '../../core/classifier/classifier.js';

export interface FormatOptions {
  colors: boolean;
  /** List every symbol skip, not only file-level ones */
  verbose: boolean;
}

export interface GenerationReport {
  batch: BatchResult;
  writes: WriteResult;
  dryRun: boolean;
}

export interface ModuleReport {
  module: ModuleModel;
  classification: ClassificationEntry[];
}

export interface IFormatter {
  formatGeneration(report: GenerationReport): string;
  formatModule(report: ModuleReport): string;
}
