/**
 * Error types and codes for solidscan.
 * This is the error contract - all errors should extend SolidScanError.
 */

/**
 * Base error class for all solidscan errors.
 */
export class SolidScanError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SolidScanError';
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
export class ConfigError extends SolidScanError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 * Error codes: S001, S005
 */
export class SystemError extends SolidScanError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Misuse of the analysis model (foreign violation handles, unknown principles).
 */
export class AnalysisError extends SolidScanError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'AnalysisError';
  }
}

/**
 * Explanation request failures. Never fatal: the message becomes the
 * violation's explanation text.
 */
export class ExplanationError extends SolidScanError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ExplanationError';
  }
}

/**
 * Report emission failures. Fatal to the run.
 */
export class ReportError extends SolidScanError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ReportError';
  }
}

export const ErrorCodes = {
  // System errors
  PARSE_ERROR: 'S001',
  INVALID_CONFIG: 'S005',

  // Analysis errors
  UNKNOWN_HANDLE: 'A001',

  // Explanation errors
  EXPLANATION_FAILED: 'X001',
  EXPLANATION_TIMEOUT: 'X002',
  UNKNOWN_PROVIDER: 'X003',

  // Report errors
  REPORT_WRITE_FAILED: 'R001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
