/**
 * Base error class for all media decoding errors
 * Every failure carries a tagged error type and structured context
 */

export enum ErrorType {
  // Decoding errors
  DECODE_FAILED = 'DECODE_FAILED',
  LIMIT_EXCEEDED = 'LIMIT_EXCEEDED',
  PROTOCOL_VIOLATION = 'PROTOCOL_VIOLATION',
  PROCESS_FAILED = 'PROCESS_FAILED',

  // Lookup errors
  MEDIA_NOT_FOUND = 'MEDIA_NOT_FOUND',
  UNSUPPORTED_TYPE = 'UNSUPPORTED_TYPE',

  // Configuration errors
  CONFIG_ERROR = 'CONFIG_ERROR',

  // Unknown errors
  UNKNOWN_ERROR = 'UNKNOWN_ERROR'
}

/**
 * A configured limit that an input went over
 */
export interface LimitViolation {
  name: string;
  value: number;
  actual: number;
}

export interface ErrorContext {
  postId?: number;
  path?: string;
  mediaType?: string;
  limit?: LimitViolation;
  exitCode?: number | null;
  signal?: string | null;
  stderr?: string;
  parameters?: Record<string, unknown>;
  additionalInfo?: string;
}

export class MediaError extends Error {
  public errorType: ErrorType;
  public context: ErrorContext;

  constructor(
    message: string,
    errorType: ErrorType = ErrorType.UNKNOWN_ERROR,
    context: ErrorContext = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'MediaError';
    this.errorType = errorType;
    this.context = context;

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert the error to a plain object for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      errorType: this.errorType,
      message: this.message,
      context: this.context,
      ...(this.cause instanceof Error
        ? { cause: { name: this.cause.name, message: this.cause.message } }
        : {})
    };
  }
}

export function isMediaError(value: unknown): value is MediaError {
  return value instanceof MediaError;
}
