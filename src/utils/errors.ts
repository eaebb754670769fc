/**
 * Error types and codes for the ACP index.
 * This is the error contract - all thrown errors should extend AcpError.
 */

/**
 * Base error class for all ACP errors.
 * The code doubles as the protocol error code returned to remote callers.
 */
export class AcpError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AcpError';
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
export class ConfigError extends AcpError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Annotation errors raised by the lexer and provenance resolver in strict mode.
 * Error codes: A001-A003
 */
export class AnnotationError extends AcpError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'AnnotationError';
  }
}

/**
 * Cache errors (incompatible schema, stale content).
 * Error codes: C001-C002
 */
export class CacheError extends AcpError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CacheError';
  }
}

/**
 * System errors (file not found, parse errors, cancellation).
 * Error codes: S001-S004
 */
export class SystemError extends AcpError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Annotation errors (A001-A003)
  MALFORMED_ANNOTATION: 'A001',
  DUPLICATE_ANNOTATION: 'A002',
  INVALID_PROVENANCE: 'A003',

  // Extraction errors (X001-X002)
  UNSUPPORTED_LANGUAGE: 'X001',
  UNPARSABLE_FILE: 'X002',

  // Cache errors (C001-C002)
  INCOMPATIBLE_CACHE: 'C001',
  STALE_CACHE: 'C002',

  // Query errors (Q001-Q003)
  NOT_FOUND: 'Q001',
  AMBIGUOUS: 'Q002',
  INVALID_REQUEST: 'Q003',

  // Config errors
  CONFIG_LOAD_ERROR: 'CFG001',
  CONFIG_INVALID: 'CFG002',

  // System errors (S001-S004)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  CANCELLED: 'S003',
  INTERNAL: 'S004',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
