/**
 * @arch testsmith.test.unit
 */
/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema, formatZodError } from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const schema = z.object({
  name: z.string(),
  level: z.number().default(1),
});

describe('parseYaml', () => {
  it('should parse mappings and sequences', () => {
    expect(parseYaml('name: test\nitems:\n  - one\n  - two\n')).toEqual({
      name: 'test',
      items: ['one', 'two'],
    });
  });

  it('should throw a parse error for invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(SystemError);

    try {
      parseYaml('key: [unclosed');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.code).toBe(ErrorCodes.PARSE_ERROR);
      }
    }
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: demo\n', schema)).toEqual({ name: 'demo', level: 1 });
  });

  it('should treat an empty document as an empty object', () => {
    expect(parseYamlWithSchema('', z.object({ flag: z.boolean().default(true) }))).toEqual({ flag: true });
  });

  it('should report schema violations with their path', () => {
    expect(() => parseYamlWithSchema('name: 5\n', schema)).toThrow(/YAML validation failed: name:/);
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should read and validate a file', async () => {
    mockReadFile.mockResolvedValue('name: loaded\nlevel: 3\n');

    await expect(loadYamlWithSchema('/project/config.yaml', schema)).resolves.toEqual({
      name: 'loaded',
      level: 3,
    });
    expect(mockReadFile).toHaveBeenCalledWith('/project/config.yaml');
  });

  it('should wrap read failures', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT'));

    await expect(loadYamlWithSchema('/missing.yaml', schema)).rejects.toMatchObject({
      code: ErrorCodes.FILE_READ_ERROR,
      message: 'Failed to read YAML file: /missing.yaml',
    });
  });

  it('should add the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('level: 2\n');

    await expect(loadYamlWithSchema('/bad.yaml', schema)).rejects.toMatchObject({
      code: ErrorCodes.INVALID_SCHEMA,
      message: expect.stringContaining('(file: /bad.yaml)'),
    });
  });
});

describe('formatZodError', () => {
  it('should join issues with semicolons', () => {
    const result = z.object({ a: z.string(), b: z.number() }).safeParse({ a: 1, b: 'x' });
    expect(result.success).toBe(false);
    if (!result.success) {
      const message = formatZodError(result.error);
      expect(message.split('; ')).toHaveLength(2);
      expect(message.startsWith('a: ')).toBe(true);
    }
  });
});
