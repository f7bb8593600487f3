/**
 * Specialized error class for decoding failures
 */
import { MediaError, ErrorType, type ErrorContext } from './MediaError';

export class DecodeError extends MediaError {
  constructor(
    message: string,
    errorType: ErrorType = ErrorType.DECODE_FAILED,
    context: ErrorContext = {},
    cause?: unknown
  ) {
    super(message, errorType, context, cause);
    this.name = 'DecodeError';
  }

  /**
   * The bytes could not be turned into an image
   */
  static imageUndecodable(
    context: ErrorContext = {},
    cause?: unknown
  ): DecodeError {
    return new DecodeError('could not decode image', ErrorType.DECODE_FAILED, context, cause);
  }

  /**
   * The probed video duration is over the configured maximum
   */
  static durationExceeded(
    duration: number,
    maxDuration: number,
    context: ErrorContext = {}
  ): DecodeError {
    return new DecodeError(
      `Video duration ${duration} exceeds maximum allowed duration ${maxDuration}`,
      ErrorType.LIMIT_EXCEEDED,
      {
        ...context,
        limit: { name: 'maxDuration', value: maxDuration, actual: duration }
      }
    );
  }

  /**
   * The input is larger than the configured upload cap
   */
  static uploadSizeExceeded(
    size: number,
    maxSize: number,
    context: ErrorContext = {}
  ): DecodeError {
    return new DecodeError(
      `Video upload size ${size} exceeds maximum allowed size ${maxSize}`,
      ErrorType.LIMIT_EXCEEDED,
      {
        ...context,
        limit: { name: 'maxUploadSizeBytes', value: maxSize, actual: size }
      }
    );
  }

  /**
   * The transcoder output did not follow the pixel-map record format
   */
  static protocolViolation(
    message: string,
    context: ErrorContext = {}
  ): DecodeError {
    return new DecodeError(message, ErrorType.PROTOCOL_VIOLATION, context);
  }

  /**
   * The transcoder did not exit after its output was fully read
   */
  static exitTimeout(
    timeoutMs: number,
    context: ErrorContext = {}
  ): DecodeError {
    return new DecodeError(
      `ffmpeg did not exit within ${timeoutMs}ms after its output ended`,
      ErrorType.PROTOCOL_VIOLATION,
      {
        ...context,
        parameters: {
          ...context.parameters,
          timeoutMs
        }
      }
    );
  }

  /**
   * The transcoder failed to start or exited unsuccessfully
   */
  static processFailed(
    exitCode: number | null,
    signal: string | null,
    stderr: string,
    context: ErrorContext = {},
    cause?: unknown
  ): DecodeError {
    const status = signal
      ? `was killed by ${signal}`
      : exitCode === null
        ? 'could not be started'
        : `exited with code ${exitCode}`;
    const diagnostics = stderr.trim();
    const message = diagnostics
      ? `ffmpeg ${status}: ${diagnostics}`
      : `ffmpeg ${status}`;

    return new DecodeError(
      message,
      ErrorType.PROCESS_FAILED,
      {
        ...context,
        exitCode,
        signal,
        stderr
      },
      cause
    );
  }
}
