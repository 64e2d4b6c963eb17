/**
 * @arch testsmith.core.domain.schema
 */
import { z } from 'zod';

/** Cumulative coverage levels, ordered from smallest to largest. */
export const CoverageLevelSchema = z.enum(['happyPath', 'comprehensive', 'full']);

export type CoverageLevel = z.infer<typeof CoverageLevelSchema>;

/** Generation options passed to `synthesize`. */
export const ConfigurationSchema = z.object({
  /** Generate tests for `_private` names */
  includePrivate: z.boolean().default(false),
  coverageLevel: CoverageLevelSchema.default('comprehensive'),
  generateFixtures: z.boolean().default(true),
  generateParametrize: z.boolean().default(true),
  /** Line budget per output file; a single oversized unit may exceed it */
  maxLinesPerFile: z.number().int().positive().default(200),
  splitLargeFiles: z.boolean().default(true),
  /** Prefix of generated test names and output file names */
  testNamePrefix: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid identifier prefix')
    .default('test_'),
});

export type Configuration = Readonly<z.infer<typeof ConfigurationSchema>>;
export type ConfigurationInput = z.input<typeof ConfigurationSchema>;

/** Default glob exclusions applied when collecting source files. */
export const DEFAULT_EXCLUDE = [
  '**/node_modules/**',
  '**/__pycache__/**',
  '**/.venv/**',
  '**/venv/**',
  '**/test_*.py',
  '**/*_test.py',
  '**/conftest.py',
];

/**
 * Project configuration file (`.testsmith/config.yaml`).
 * Generation keys mirror the Configuration record.
 */
export const ProjectConfigSchema = ConfigurationSchema.extend({
  /** Directory receiving generated test files */
  outputDir: z.string().min(1).default('tests/generated'),
  /** Glob patterns excluded from source discovery */
  exclude: z.array(z.string()).default(DEFAULT_EXCLUDE),
  /** Parallel files per batch (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
}).strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
