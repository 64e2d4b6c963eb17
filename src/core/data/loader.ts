/**
 * @arch testsmith.infra.data
 *
 * Validation for the versioned lookup tables bundled beside this module.
 */
import { z } from 'zod';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';

/**
 * Validate the contents of a bundled JSON data file.
 */
export function parseDataFile<T extends z.ZodType>(fileName: string, raw: unknown, schema: T): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_DATA_FILE,
      `Invalid data file ${fileName}: ${formatZodError(result.error)}`,
      { fileName, errors: result.error.issues }
    );
  }
  return result.data;
}
