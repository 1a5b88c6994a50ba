/**
 * Error types and codes for bracecheck.
 * All errors raised by the tool extend BracecheckError.
 */

/**
 * Base error class for all bracecheck errors.
 */
export class BracecheckError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BracecheckError';
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
 * Configuration errors (loading, parsing, validation).
 */
export class ConfigError extends BracecheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * The scan target is missing, unreadable, or not valid UTF-8.
 * Error codes: S001-S003
 */
export class FileAccessError extends BracecheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'FileAccessError';
  }
}

export const ErrorCodes = {
  // File access (S001-S003)
  FILE_NOT_FOUND: 'S001',
  FILE_UNREADABLE: 'S002',
  FILE_NOT_DECODABLE: 'S003',

  // Configuration
  CONFIG_LOAD_ERROR: 'C001',
  PARSE_ERROR: 'C002',
  INVALID_CONFIG: 'C003',

  // Command line usage
  MISSING_TARGET: 'U001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
