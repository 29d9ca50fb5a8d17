// SHARED ERROR MODEL - Used across all services and CLI entry points

export interface ErrorPayload {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export class AppError extends Error {
  code: ErrorCode;
  metadata?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, metadata?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.metadata = metadata;
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): ErrorPayload {
    return {
      code: this.code,
      message: this.message,
      details: this.metadata
    };
  }
}

// Label pipeline error codes
export const ErrorCodes = {
  // Per-record failures: the record is abandoned, the batch continues
  UNKNOWN_ICON_TOKEN: 'UNKNOWN_ICON_TOKEN',
  CODE_ENCODING_FAILURE: 'CODE_ENCODING_FAILURE',
  RENDERING_FAILURE: 'RENDERING_FAILURE',
  EXPORT_BACKEND_FAILURE: 'EXPORT_BACKEND_FAILURE',

  // Recoverable: the code generator degrades to a standard QR code
  SHORTENING_UNAVAILABLE: 'SHORTENING_UNAVAILABLE',

  // Startup failures
  MISSING_COLUMNS: 'MISSING_COLUMNS',
  UNSUPPORTED_FORMAT: 'UNSUPPORTED_FORMAT',
  INVALID_INPUT: 'INVALID_INPUT',
  NOT_FOUND: 'NOT_FOUND'
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Narrow an unknown thrown value to an AppError, optionally with a specific code
 */
export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  if (!(error instanceof AppError)) return false;
  return code === undefined || error.code === code;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
