/**
 * Frame records handed to the persistence layer
 */
import type { DecodedFrame } from '../../types/media';

export interface FrameInfo {
  postId: number;
  frameNumber: number;
  /** Seconds from the start of the media, 0 when unknown */
  timestamp: number;
  isKeyframe: boolean;
  createdAt: Date;
}

export function toFrameInfo(
  postId: number,
  frame: Pick<DecodedFrame, 'index' | 'timestamp' | 'isKeyframe'>,
  createdAt: Date = new Date()
): FrameInfo {
  return {
    postId,
    frameNumber: frame.index,
    timestamp: frame.timestamp ?? 0,
    isKeyframe: frame.isKeyframe,
    createdAt,
  };
}

/**
 * Group a frame sequence into arrays of at most `size` items
 * The last batch may be shorter. Nothing is pulled ahead of the batch being filled.
 */
export async function* batchFrames<T>(
  frames: AsyncIterable<T>,
  size: number
): AsyncGenerator<T[], void, undefined> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  let batch: T[] = [];
  for await (const frame of frames) {
    batch.push(frame);
    if (batch.length === size) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) {
    yield batch;
  }
}
