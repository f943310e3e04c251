/**
 * Error codes for failures surfaced by the pipeline.
 */
export enum ErrorCode {
  CONFIGURATION = 'CONFIGURATION',
  PROVIDER = 'PROVIDER',
  STORE = 'STORE',
  VALIDATION = 'VALIDATION',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
}

/**
 * Base class for every error the pipeline raises on purpose.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** Missing credentials or invalid settings. Fatal, never retried. */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.CONFIGURATION, message, cause);
    this.name = 'ConfigurationError';
  }
}

/** The embedding provider or generative model failed or answered with garbage. */
export class ProviderError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.PROVIDER, message, cause);
    this.name = 'ProviderError';
  }
}

/** The persistence layer rejected a write or could not be reached. */
export class StoreError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.STORE, message, cause);
    this.name = 'StoreError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown, code: ErrorCode = ErrorCode.VALIDATION) {
    super(code, message, cause);
    this.name = 'ValidationError';
  }
}

export class UnsupportedFormatError extends ValidationError {
  constructor(public readonly extension: string) {
    super(`Unsupported file type: ${extension || '(none)'}`, undefined, ErrorCode.UNSUPPORTED_FORMAT);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Get a printable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
