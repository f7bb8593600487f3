/**
 * Specialized error class for media types without a registered decoder
 */
import { MediaError, ErrorType, type ErrorContext } from './MediaError';

export class UnsupportedTypeError extends MediaError {
  constructor(
    message: string,
    context: ErrorContext = {}
  ) {
    super(message, ErrorType.UNSUPPORTED_TYPE, context);
    this.name = 'UnsupportedTypeError';
  }

  static noDecoder(
    postId: number,
    mediaType: string,
    context: ErrorContext = {}
  ): UnsupportedTypeError {
    return new UnsupportedTypeError(
      `Decoder needed for post ${postId} of type ${mediaType} is not implemented`,
      {
        ...context,
        postId,
        mediaType
      }
    );
  }
}
