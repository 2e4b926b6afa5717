/**
 * Error types and codes for codeprint.
 * All errors raised by the library extend CodeprintError.
 */

/**
 * Base error class for all codeprint errors.
 */
export class CodeprintError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CodeprintError';
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
 * Raised before any file is processed.
 * Error codes: C001-C004
 */
export class ConfigError extends CodeprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (missing roots, unreadable files, parse errors).
 * Error codes: S001-S005
 */
export class SystemError extends CodeprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Errors that abort a comparison run after it started.
 */
export class PipelineError extends CodeprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PipelineError';
  }
}

export const ErrorCodes = {
  // Configuration errors (C001-C004)
  INVALID_CONFIG: 'C001',
  INVALID_SHINGLE_SIZE: 'C002',
  EMPTY_KEYWORDS: 'C003',
  UNKNOWN_KEYWORD_SET: 'C004',

  // System and per-file errors (S001-S007)
  PARSE_ERROR: 'S001',
  READ_ERROR: 'S002',
  BINARY_CONTENT: 'S003',
  FILE_TOO_LARGE: 'S004',
  NOT_A_DIRECTORY: 'S005',
  TIMEOUT: 'S006',
  TOKENS_TRUNCATED: 'S007',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCodes));

export function isErrorCode(code: string): code is ErrorCode {
  return KNOWN_CODES.has(code);
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
