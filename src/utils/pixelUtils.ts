/**
 * Pixel buffer conversions
 */
import type { DecodedFrame } from '../types/media';

export const BGR_CHANNELS = 3;

/**
 * Swap the first and third sample of every 3-byte pixel in place
 * Turns RGB into BGR and back.
 */
export function swapRedBlue(data: Buffer): Buffer {
  if (data.length % BGR_CHANNELS !== 0) {
    throw new RangeError(`Pixel buffer length ${data.length} is not a multiple of ${BGR_CHANNELS}`);
  }
  for (let i = 0; i < data.length; i += BGR_CHANNELS) {
    const red = data[i];
    data[i] = data[i + 2];
    data[i + 2] = red;
  }
  return data;
}

/**
 * Expand single-channel samples into 3-channel pixels
 */
export function expandGrey(data: Buffer): Buffer {
  const out = Buffer.alloc(data.length * BGR_CHANNELS);
  for (let i = 0; i < data.length; i++) {
    const value = data[i];
    out[i * 3] = value;
    out[i * 3 + 1] = value;
    out[i * 3 + 2] = value;
  }
  return out;
}

/**
 * Build a frame from raw interleaved samples
 *
 * @param data - Row-major samples, 1 or 3 per pixel, RGB when 3
 * @throws RangeError when the dimensions and the buffer disagree
 */
export function toBgrFrame(
  data: Buffer,
  width: number,
  height: number,
  channels: number,
  meta: Pick<DecodedFrame, 'index' | 'isKeyframe' | 'timestamp'>
): DecodedFrame {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RangeError(`Invalid frame dimensions ${width}x${height}`);
  }
  if (channels !== 1 && channels !== BGR_CHANNELS) {
    throw new RangeError(`Unsupported channel count ${channels}`);
  }
  if (data.length !== width * height * channels) {
    throw new RangeError(
      `Pixel buffer holds ${data.length} bytes, expected ${width * height * channels}`
    );
  }

  const bgr = channels === 1 ? expandGrey(data) : swapRedBlue(data);
  const frame: DecodedFrame = {
    data: bgr,
    width,
    height,
    channels: BGR_CHANNELS,
    channelOrder: 'bgr',
    index: meta.index,
    isKeyframe: meta.isKeyframe,
  };
  if (meta.timestamp !== undefined) {
    frame.timestamp = meta.timestamp;
  }
  return frame;
}
