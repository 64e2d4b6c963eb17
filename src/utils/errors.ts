/**
 * @arch testsmith.common.errors
 *
 * Error types and codes for testsmith.
 * All errors raised by the pipeline extend TestsmithError.
 */

/**
 * Base error class for all testsmith errors.
 */
export class TestsmithError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TestsmithError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Source text could not be parsed. Fatal for the file, never for a batch.
 */
export class SyntaxAnalysisError extends TestsmithError {
  constructor(
    public readonly path: string,
    public readonly line: number,
    public readonly column: number,
    message?: string
  ) {
    super(
      ErrorCodes.SYNTAX_ERROR,
      message ?? `Syntax error in ${path} at line ${line}, column ${column}`,
      { path, line, column }
    );
    this.name = 'SyntaxAnalysisError';
  }
}

/**
 * A recognized declaration shape that the pipeline does not handle.
 * Only the affected symbol is skipped.
 */
export class UnsupportedConstructError extends TestsmithError {
  constructor(
    public readonly symbol: string,
    public readonly line: number,
    reason: string
  ) {
    super(ErrorCodes.UNSUPPORTED_CONSTRUCT, reason, { symbol, line });
    this.name = 'UnsupportedConstructError';
  }
}

/**
 * Invalid configuration. Raised before any file is processed.
 */
export class ConfigurationError extends TestsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A candidate could not be rendered into a test unit.
 */
export class RenderError extends TestsmithError {
  constructor(
    public readonly symbol: string,
    message: string
  ) {
    super(ErrorCodes.RENDER_ERROR, message, { symbol });
    this.name = 'RenderError';
  }
}

/**
 * System errors (file access, YAML parsing, data files).
 */
export class SystemError extends TestsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Pipeline errors (P001-P003)
  SYNTAX_ERROR: 'P001',
  UNSUPPORTED_CONSTRUCT: 'P002',
  RENDER_ERROR: 'P003',

  // Configuration errors (C001-C002)
  INVALID_CONFIG: 'C001',
  CONFIG_LOAD_ERROR: 'C002',

  // System errors (S001-S004)
  PARSE_ERROR: 'S001',
  INVALID_SCHEMA: 'S002',
  FILE_READ_ERROR: 'S003',
  INVALID_DATA_FILE: 'S004',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
