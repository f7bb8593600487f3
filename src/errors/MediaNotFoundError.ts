/**
 * Specialized error class for media files that are missing or unreadable
 */
import { MediaError, ErrorType, type ErrorContext } from './MediaError';

export class MediaNotFoundError extends MediaError {
  constructor(
    message: string,
    context: ErrorContext = {},
    cause?: unknown
  ) {
    super(message, ErrorType.MEDIA_NOT_FOUND, context, cause);
    this.name = 'MediaNotFoundError';
  }

  /**
   * Create a not found error for a post whose file could not be opened or read
   */
  static unreadable(
    postId: number,
    path: string,
    cause?: unknown,
    context: ErrorContext = {}
  ): MediaNotFoundError {
    return new MediaNotFoundError(
      `Could not read images for post ${postId} from file ${path}`,
      {
        ...context,
        postId,
        path
      },
      cause
    );
  }
}
