/**
 * Error types and codes for checksum-utils.
 * Every error raised by the tool itself extends ChecksumUtilsError.
 */

/**
 * Base error class for all checksum-utils errors.
 */
export class ChecksumUtilsError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ChecksumUtilsError';
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
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends ChecksumUtilsError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Errors raised while turning inputs into candidate files.
 * Error codes: T001-T006
 */
export class TraversalError extends ChecksumUtilsError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TraversalError';
  }
}

/**
 * System errors (parse errors, bad input).
 * Error codes: S001-S003
 */
export class SystemError extends ChecksumUtilsError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Traversal errors (T001-T006)
  NO_MATCHES: 'T001',
  PATH_NOT_FOUND: 'T002',
  IS_CHECKSUM_FILE: 'T003',
  WALK_FAILED: 'T004',
  STDIN_READ_FAILED: 'T005',
  PATH_UNREADABLE: 'T006',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',

  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  INVALID_CONFIG: 'S002',
  NO_INPUT: 'S003',
} as const;

/**
 * Narrow an unknown thrown value to a Node.js errno exception.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * True for failures the operator can usually fix by adjusting permissions.
 */
export function isPermissionError(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM');
}

export function isNotFoundError(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

/**
 * Wrap any thrown value into an Error so it can be attached to an outcome.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Message of any thrown value, for log lines.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
