/**
 * @arch fmtkit.common.errors
 *
 * Error types and codes for fmtkit.
 * All errors raised by the formatting pipeline extend FmtkitError.
 */

/**
 * Base error class for all fmtkit errors.
 */
export class FmtkitError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FmtkitError';
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
 * Configuration errors. Fatal: the run aborts before any file is touched.
 */
export class ConfigError extends FmtkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * A formatting engine could not produce output for one file.
 * Recovered per file as a failure.
 */
export class FormatError extends FmtkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'FormatError';
  }
}

/**
 * System errors (unreadable files, failed writes, parse errors).
 */
export class SystemError extends FmtkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration errors (C001-C004)
  CONFIG_NOT_FOUND: 'C001',
  CONFIG_INVALID: 'C002',
  NO_FORMATTER: 'C003',
  UNSUPPORTED_ENCODING: 'C004',

  // Formatting errors
  FORMAT_FAILED: 'F001',

  // System errors (S001-S004)
  READ_FAILED: 'S001',
  WRITE_FAILED: 'S002',
  CACHE_PERSIST_FAILED: 'S003',
  PARSE_ERROR: 'S004',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
