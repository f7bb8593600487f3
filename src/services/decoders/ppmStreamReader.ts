/**
 * Reader for a stream of binary pixel-map (P6) records
 *
 * Each record is three text header lines followed by the raw payload:
 *
 *   P6\n
 *   <width> <height>\n
 *   255\n
 *   <width * height * 3 bytes, RGB>
 *
 * The payload follows the last newline directly, so header lines are cut
 * at the first newline and nothing past it is consumed.
 */
import type { Readable } from 'node:stream';
import { DecodeError } from '../../errors';
import { toBuffer } from '../../utils/streamUtils';

const NEWLINE = 0x0a;
const DIMENSIONS_PATTERN = /^(\d+) (\d+)$/;

export const PPM_MAGIC = 'P6';
export const PPM_MAX_VALUE = 255;
export const PPM_CHANNELS = 3;

/**
 * Pull-based byte cursor over an async chunk source
 */
export class ByteReader {
  private pending: Buffer = Buffer.alloc(0);
  private ended = false;

  constructor(private readonly chunks: AsyncIterator<unknown>) {}

  static fromStream(stream: Readable): ByteReader {
    return new ByteReader(stream[Symbol.asyncIterator]());
  }

  /**
   * Read one line without its terminator, trimmed
   * @returns null when the source ended before any byte of the line
   */
  async readLine(): Promise<string | null> {
    let searchFrom = 0;
    for (;;) {
      const end = this.pending.indexOf(NEWLINE, searchFrom);
      if (end !== -1) {
        const line = this.pending.subarray(0, end);
        this.pending = this.pending.subarray(end + 1);
        return line.toString('latin1').trim();
      }

      searchFrom = this.pending.length;
      const chunk = await this.pull();
      if (chunk === null) {
        if (this.pending.length === 0) {
          return null;
        }
        // Unterminated last line
        const line = this.pending.toString('latin1').trim();
        this.pending = Buffer.alloc(0);
        return line;
      }
      this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    }
  }

  /**
   * Read `size` bytes, or whatever is left when the source ends first
   */
  async readExactly(size: number): Promise<Buffer> {
    const parts: Buffer[] = [];
    let missing = size;

    const take = (chunk: Buffer): void => {
      if (chunk.length <= missing) {
        parts.push(chunk);
        missing -= chunk.length;
      } else {
        parts.push(chunk.subarray(0, missing));
        this.pending = chunk.subarray(missing);
        missing = 0;
      }
    };

    const buffered = this.pending;
    this.pending = Buffer.alloc(0);
    take(buffered);

    while (missing > 0) {
      const chunk = await this.pull();
      if (chunk === null) {
        break;
      }
      take(chunk);
    }

    // Copy so the frame owns its memory instead of pinning stream chunks
    return Buffer.concat(parts, size - missing);
  }

  /**
   * Stop reading and release the underlying source
   */
  async cancel(): Promise<void> {
    this.ended = true;
    this.pending = Buffer.alloc(0);
    await this.chunks.return?.();
  }

  private async pull(): Promise<Buffer | null> {
    if (this.ended) {
      return null;
    }
    const result = await this.chunks.next();
    if (result.done) {
      this.ended = true;
      return null;
    }
    return toBuffer(result.value);
  }
}

export interface PpmRecord {
  width: number;
  height: number;
  /** width * height * 3 samples, red-green-blue */
  data: Buffer;
}

export class PpmStreamReader {
  private records = 0;

  constructor(private readonly reader: ByteReader) {}

  get recordsRead(): number {
    return this.records;
  }

  /**
   * Parse the next record
   * @returns null on a clean end of stream before the format line
   * @throws DecodeError for anything that is not a complete P6 record
   */
  async next(): Promise<PpmRecord | null> {
    const format = await this.reader.readLine();
    if (format === null) {
      return null;
    }
    if (format !== PPM_MAGIC) {
      throw DecodeError.protocolViolation(
        'frames returned by ffmpeg cannot be decoded due to an unsupported format',
        { parameters: { format, record: this.records } }
      );
    }

    const dimensions = await this.reader.readLine();
    const match = dimensions === null ? null : DIMENSIONS_PATTERN.exec(dimensions);
    const width = match ? Number(match[1]) : 0;
    const height = match ? Number(match[2]) : 0;
    if (width <= 0 || height <= 0) {
      throw DecodeError.protocolViolation(
        `invalid frame dimensions "${dimensions ?? ''}"`,
        { parameters: { dimensions, record: this.records } }
      );
    }

    const maxValue = await this.reader.readLine();
    if (maxValue !== String(PPM_MAX_VALUE)) {
      throw DecodeError.protocolViolation(
        `max_value has to be ${PPM_MAX_VALUE}, it is ${maxValue ?? 'missing'}`,
        { parameters: { maxValue, record: this.records } }
      );
    }

    const expected = width * height * PPM_CHANNELS;
    const data = await this.reader.readExactly(expected);
    if (data.length < expected) {
      throw DecodeError.protocolViolation('could not read the full frame', {
        parameters: { expected, actual: data.length, record: this.records }
      });
    }

    this.records++;
    return { width, height, data };
  }
}
