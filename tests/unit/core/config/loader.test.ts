/**
 * @arch testsmith.test.unit
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  createConfiguration,
  getDefaultConfiguration,
  toConfiguration,
  loadConfig,
  getConfigPath,
} from '../../../../src/core/config/loader.js';
import { ProjectConfigSchema } from '../../../../src/core/config/schema.js';
import { ConfigurationError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('createConfiguration', () => {
  it('should return a frozen record with defaults', () => {
    const config = createConfiguration({ coverageLevel: 'full' });

    expect(config.coverageLevel).toBe('full');
    expect(config.maxLinesPerFile).toBe(200);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should reject unknown keys by default', () => {
    expect(() => createConfiguration({ outputDir: 'out' })).toThrow(ConfigurationError);
  });

  it('should drop unknown keys when allowed', () => {
    const config = createConfiguration({ outputDir: 'out', splitLargeFiles: false }, { allowUnknownKeys: true });

    expect(config.splitLargeFiles).toBe(false);
    expect(Object.keys(config)).not.toContain('outputDir');
  });

  it('should report invalid values with the config error code', () => {
    try {
      createConfiguration({ maxLinesPerFile: -5 });
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
        expect(error.message).toMatch(/^Invalid configuration: maxLinesPerFile: /);
      }
    }
  });

  it('should match the defaults helper', () => {
    expect(getDefaultConfiguration()).toEqual(createConfiguration());
  });
});

describe('toConfiguration', () => {
  it('should pick generation keys from a project config', () => {
    const project = ProjectConfigSchema.parse({ includePrivate: true, outputDir: 'generated' });

    expect(toConfiguration(project).includePrivate).toBe(true);
  });

  it('should let overrides win and validate them', () => {
    const project = ProjectConfigSchema.parse({ coverageLevel: 'happyPath' });

    expect(toConfiguration(project, { coverageLevel: 'full' }).coverageLevel).toBe('full');
    expect(() => toConfiguration(project, { coverageLevel: 'most' })).toThrow(ConfigurationError);
  });
});

describe('loadConfig', () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = join(tmpdir(), `testsmith-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(join(projectRoot, '.testsmith'), { recursive: true });
  });

  afterEach(() => {
    rmSync(projectRoot, { recursive: true, force: true });
  });

  it('should return defaults when no config file exists', async () => {
    const config = await loadConfig(projectRoot);

    expect(config).toEqual(ProjectConfigSchema.parse({}));
  });

  it('should read the default config path', async () => {
    writeFileSync(getConfigPath(projectRoot), 'coverageLevel: full\nmaxLinesPerFile: 80\n');

    const config = await loadConfig(projectRoot);

    expect(config.coverageLevel).toBe('full');
    expect(config.maxLinesPerFile).toBe(80);
    expect(config.outputDir).toBe('tests/generated');
  });

  it('should read an explicit config path', async () => {
    writeFileSync(join(projectRoot, 'custom.yaml'), 'outputDir: out/tests\n');

    const config = await loadConfig(projectRoot, 'custom.yaml');

    expect(config.outputDir).toBe('out/tests');
  });

  it('should fail when an explicit config path is missing', async () => {
    await expect(loadConfig(projectRoot, 'nope.yaml')).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_LOAD_ERROR,
    });
  });

  it('should wrap invalid config files', async () => {
    writeFileSync(getConfigPath(projectRoot), 'maxLinesPerFile: many\n');

    await expect(loadConfig(projectRoot)).rejects.toThrow(/^Failed to load config from /);
  });
});
