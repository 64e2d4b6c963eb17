/**
 * @arch testsmith.core.domain
 */
import * as path from 'node:path';
import {
  ConfigurationSchema,
  ProjectConfigSchema,
  type Configuration,
  type ProjectConfig,
} from './schema.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigurationError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.testsmith/config.yaml';

/**
 * Validate generation options and apply defaults.
 * The returned record is frozen; callers construct it once and pass it by reference.
 * Unknown keys are rejected unless `allowUnknownKeys` is set, in which case they are dropped.
 */
export function createConfiguration(
  input: unknown = {},
  options: { allowUnknownKeys?: boolean } = {}
): Configuration {
  const result = options.allowUnknownKeys
    ? ConfigurationSchema.safeParse(input)
    : ConfigurationSchema.strict().safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid configuration: ${formatZodError(result.error)}`,
      { issues: result.error.issues }
    );
  }
  return Object.freeze(result.data);
}

/**
 * Default configuration values.
 */
export function getDefaultConfiguration(): Configuration {
  return createConfiguration({});
}

/**
 * Pick the generation options out of a project config, then apply overrides.
 * Overrides are validated like any other input.
 */
export function toConfiguration(
  project: ProjectConfig,
  overrides: Record<string, unknown> = {}
): Configuration {
  return createConfiguration({
    includePrivate: project.includePrivate,
    coverageLevel: project.coverageLevel,
    generateFixtures: project.generateFixtures,
    generateParametrize: project.generateParametrize,
    maxLinesPerFile: project.maxLinesPerFile,
    splitLargeFiles: project.splitLargeFiles,
    testNamePrefix: project.testNamePrefix,
    ...overrides,
  });
}

/**
 * Load the project configuration file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<ProjectConfig> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigurationError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return ProjectConfigSchema.parse({});
  }

  try {
    return await loadYamlWithSchema(fullPath, ProjectConfigSchema);
  } catch (error) {
    throw new ConfigurationError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load config from ${fullPath}: ${getErrorMessage(error)}`,
      { path: fullPath, originalError: getErrorMessage(error) }
    );
  }
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}
