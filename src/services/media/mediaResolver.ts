/**
 * Media resolution for posts
 *
 * Picks the file to decode for a post, preferring the full-size variant,
 * opens it and hands it to the decoder registered for the post's type.
 */
import { open, stat, type FileHandle } from 'node:fs/promises';
import { resolve } from 'node:path';
import { MediaNotFoundError, UnsupportedTypeError } from '../../errors';
import type { Limits } from '../../config/limits';
import type { DecodedFrame, MediaDecoder, MediaType, Post } from '../../types/media';
import { createDecodeContext } from '../../utils/decodeContext';
import { isSystemError, rethrowWrappingIoErrors } from '../../utils/errorHandlingUtils';
import { createCategoryLogger } from '../../utils/logger';
import { FrameStream } from '../frames/FrameStream';

const logger = createCategoryLogger('MediaResolver');

/** Subdirectory of the media root holding full-size variants */
export const FULLSIZE_DIRECTORY = 'full';

export interface MediaResolverOptions {
  mediaRoot: string;
  decoders: ReadonlyMap<MediaType, MediaDecoder>;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (isSystemError(err)) {
      return false;
    }
    throw err;
  }
}

export class MediaResolver {
  private readonly mediaRoot: string;
  private readonly decoders: ReadonlyMap<MediaType, MediaDecoder>;

  constructor(options: MediaResolverOptions) {
    this.mediaRoot = resolve(options.mediaRoot);
    this.decoders = options.decoders;
  }

  /**
   * Decoded frames of a post's media
   *
   * The decoder lookup happens immediately; everything that touches the
   * file system waits for the first pull. The file is closed whenever the
   * stream stops.
   *
   * @throws UnsupportedTypeError when no decoder handles the post's type
   */
  getFrames(post: Post, limits: Limits): FrameStream<DecodedFrame> {
    const decoder = this.decoders.get(post.type);
    if (!decoder) {
      throw UnsupportedTypeError.noDecoder(post.id, post.type);
    }

    const resolver = this;
    let cancelled = false;
    let decoding: FrameStream<DecodedFrame> | undefined;

    const frames = async function* (): AsyncGenerator<DecodedFrame, void, undefined> {
      let path = resolve(resolver.mediaRoot, post.image);
      let handle: FileHandle | undefined;
      try {
        path = await resolver.resolvePath(post);
        handle = await open(path, 'r');
        if (cancelled) {
          return;
        }
        decoding = decoder.decodeFrames({ path, handle }, limits);
        yield* decoding;
      } catch (err) {
        rethrowWrappingIoErrors(err, cause => {
          const error = MediaNotFoundError.unreadable(post.id, path, cause, { mediaType: post.type });
          logger.errorWithContext('Could not read media', error, { postId: post.id });
          return error;
        });
      } finally {
        await handle?.close();
      }
    };

    return new FrameStream(frames(), {
      context: createDecodeContext(post.id),
      onCancel: () => {
        cancelled = true;
        decoding?.cancel();
      }
    });
  }

  /**
   * Absolute path of the file to decode for a post
   */
  async resolvePath(post: Post): Promise<string> {
    const primary = resolve(this.mediaRoot, post.image);
    if (!post.fullsize) {
      return primary;
    }

    const fullsize = resolve(this.mediaRoot, FULLSIZE_DIRECTORY, post.fullsize);
    if (await isFile(fullsize)) {
      logger.debug(`Using fullsize image ${fullsize}`, { postId: post.id });
      return fullsize;
    }

    logger.warn(
      `Fullsize image for ${post.id} not found at ${fullsize}. Falling back to resized image`,
      { postId: post.id, fullsize, fallback: primary }
    );
    return primary;
  }
}
