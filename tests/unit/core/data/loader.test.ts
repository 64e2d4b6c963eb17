/**
 * @arch testsmith.test.unit
 */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseDataFile } from '../../../../src/core/data/loader.js';
import valueTables from '../../../../src/core/data/value-tables.json' with { type: 'json' };
import { ErrorCodes } from '../../../../src/utils/errors.js';

describe('parseDataFile', () => {
  it('should validate a bundled table', () => {
    const data = parseDataFile(
      'value-tables.json',
      valueTables,
      z.object({ version: z.literal(1), expectedError: z.string() })
    );

    expect(data).toEqual({ version: 1, expectedError: 'TypeError' });
  });

  it('should fail for contents that do not match the schema', () => {
    const parse = (): unknown => parseDataFile('value-tables.json', valueTables, z.object({ version: z.literal(2) }));

    expect(parse).toThrow(/^Invalid data file value-tables\.json: version: /);
    try {
      parse();
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCodes.INVALID_DATA_FILE, details: { fileName: 'value-tables.json' } });
    }
  });

  it('should reject a table that is not an object', () => {
    expect(() => parseDataFile('broken.json', [], z.object({ version: z.literal(1) }))).toThrow(
      /^Invalid data file broken\.json: /
    );
  });
});
