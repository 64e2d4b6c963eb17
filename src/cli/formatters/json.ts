/**
 * @arch testsmith.cli.formatter
 */
import type { GenerationReport, IFormatter, ModuleReport } from './types.js';

/**
 * JSON output formatter. Generated file content is left out; it is on disk.
 */
export class JsonFormatter implements IFormatter {
  formatGeneration(report: GenerationReport): string {
    const { batch, writes, dryRun } = report;
    return JSON.stringify(
      {
        summary: batch.summary,
        skips: batch.skips,
        files: batch.results.map((result) =>
          result.status === 'processed'
            ? {
                path: result.path,
                status: result.status,
                outputs: result.files.map((f) => ({ path: f.path, lines: f.lineCount })),
                tested: result.tested,
              }
            : { path: result.path, status: result.status, reason: result.reason }
        ),
        written: writes.written,
        kept: writes.skipped,
        dryRun,
      },
      null,
      2
    );
  }

  formatModule(report: ModuleReport): string {
    return JSON.stringify(
      {
        module: report.module,
        classification: report.classification.map((entry) => ({
          symbol: entry.symbol.qualifiedName,
          included: entry.included,
          ...(entry.reason ? { reason: entry.reason } : {}),
        })),
      },
      null,
      2
    );
  }
}
