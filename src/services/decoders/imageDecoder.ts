/**
 * Still image decoding with sharp
 */
import sharp from 'sharp';
import { DecodeError } from '../../errors';
import type { DecodedFrame, MediaDecoder, MediaSource } from '../../types/media';
import { createCategoryLogger } from '../../utils/logger';
import { toBgrFrame } from '../../utils/pixelUtils';
import { FrameStream } from '../frames/FrameStream';

const logger = createCategoryLogger('ImageDecoder');

export class ImageDecoder implements MediaDecoder {
  /**
   * Decode encoded image bytes into one BGR frame
   * Alpha is dropped and greyscale is widened to three channels.
   * @throws DecodeError when the bytes are not a decodable image
   */
  async decode(bytes: Buffer): Promise<DecodedFrame> {
    if (bytes.length === 0) {
      throw DecodeError.imageUndecodable({ additionalInfo: 'empty input' });
    }

    let raw: { data: Buffer; info: sharp.OutputInfo };
    try {
      raw = await sharp(bytes)
        .removeAlpha()
        .toColourspace('srgb')
        .raw()
        .toBuffer({ resolveWithObject: true });
    } catch (err) {
      throw DecodeError.imageUndecodable({}, err);
    }

    const { data, info } = raw;
    if (data.length === 0 || info.width === 0 || info.height === 0) {
      throw DecodeError.imageUndecodable({ additionalInfo: 'decoder returned an empty image' });
    }

    try {
      return toBgrFrame(data, info.width, info.height, info.channels, {
        index: 0,
        isKeyframe: true,
      });
    } catch (err) {
      throw DecodeError.imageUndecodable(
        { parameters: { width: info.width, height: info.height, channels: info.channels } },
        err
      );
    }
  }

  /**
   * Read the whole file and decode it as a single frame
   */
  decodeFrames(source: MediaSource): FrameStream<DecodedFrame> {
    const decoder = this;

    async function* frames(): AsyncGenerator<DecodedFrame, void, undefined> {
      const bytes = await source.handle.readFile();
      const frame = await decoder.decode(bytes);
      logger.debug('Decoded image', {
        path: source.path,
        width: frame.width,
        height: frame.height,
        bytes: bytes.length,
      });
      yield frame;
    }

    return new FrameStream(frames());
  }
}
