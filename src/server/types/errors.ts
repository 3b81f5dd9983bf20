/**
 * Centralized error type definitions for floor-plan label extraction
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Sources
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
  DETECTOR_FAILED = 'DETECTOR_FAILED',

  // Input
  MALFORMED_RULE = 'MALFORMED_RULE',
  INVALID_BBOX = 'INVALID_BBOX',
  EMPTY_QUERY = 'EMPTY_QUERY',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // Runtime
  PAGE_TIMEOUT = 'PAGE_TIMEOUT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * PDF missing, unreadable, or the requested page does not exist.
 * Vector providers convert this to zero tokens so the fallback can run.
 */
export class SourceUnavailableError extends AppError {
  constructor(source: string, message: string, context?: Record<string, unknown>) {
    super(`Source unavailable (${source}): ${message}`, ErrorCode.SOURCE_UNAVAILABLE, true, { source, ...context });
  }
}

export class DetectorError extends AppError {
  constructor(detector: string, message: string, context?: Record<string, unknown>) {
    super(`Detector failed (${detector}): ${message}`, ErrorCode.DETECTOR_FAILED, true, { detector, ...context });
  }
}

/**
 * A rule payload that cannot be executed (invalid regex, missing fields).
 * The payload is skipped; the page continues.
 */
export class MalformedRuleError extends AppError {
  public readonly payloadIndex: number;

  constructor(payloadIndex: number, message: string, context?: Record<string, unknown>) {
    super(`Malformed rule payload #${payloadIndex}: ${message}`, ErrorCode.MALFORMED_RULE, true, {
      payloadIndex,
      ...context,
    });
    this.payloadIndex = payloadIndex;
  }
}

export class InvalidBboxError extends AppError {
  constructor(bbox: readonly number[], label = 'bbox') {
    super(
      `[${label}] Invalid bbox. Expected [x, y, width, height] with positive finite dimensions, got [${bbox.join(', ')}]`,
      ErrorCode.INVALID_BBOX,
      true,
      { bbox: [...bbox] }
    );
  }
}

export class EmptyQueryError extends AppError {
  constructor() {
    super('At least one query criterion is required', ErrorCode.EMPTY_QUERY, true);
  }
}

export class PageTimeoutError extends AppError {
  constructor(pageId: string, timeoutMs: number) {
    super(`Page ${pageId} timed out after ${timeoutMs}ms`, ErrorCode.PAGE_TIMEOUT, true, { pageId, timeoutMs });
  }
}

export class ConfigurationError extends AppError {
  constructor(variable: string, message: string) {
    super(`Invalid configuration ${variable}: ${message}`, ErrorCode.CONFIGURATION_ERROR, false, { variable });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Type guard to check if error is an operational error
 */
export function isOperationalError(error: unknown): boolean {
  return isAppError(error) && error.isOperational;
}

/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_ERROR, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_ERROR, false);
}
