/**
 * Tests for pixel conversions
 */
import { describe, it, expect } from 'vitest';
import { expandGrey, swapRedBlue, toBgrFrame } from '../../src/utils/pixelUtils';

describe('pixelUtils', () => {
  describe('swapRedBlue', () => {
    it('should swap the outer samples of every pixel in place', () => {
      const data = Buffer.from([1, 2, 3, 4, 5, 6]);

      expect(swapRedBlue(data)).toBe(data);
      expect(data).toEqual(Buffer.from([3, 2, 1, 6, 5, 4]));
    });

    it('should reject a buffer that is not whole pixels', () => {
      expect(() => swapRedBlue(Buffer.from([1, 2]))).toThrow(
        'Pixel buffer length 2 is not a multiple of 3'
      );
    });
  });

  it('should widen grey samples to three channels', () => {
    expect(expandGrey(Buffer.from([9, 200]))).toEqual(Buffer.from([9, 9, 9, 200, 200, 200]));
  });

  describe('toBgrFrame', () => {
    it('should build a BGR frame from RGB samples', () => {
      const frame = toBgrFrame(Buffer.from([255, 0, 0]), 1, 1, 3, { index: 4, isKeyframe: true, timestamp: 2 });

      expect(frame).toEqual({
        data: Buffer.from([0, 0, 255]),
        width: 1,
        height: 1,
        channels: 3,
        channelOrder: 'bgr',
        index: 4,
        isKeyframe: true,
        timestamp: 2
      });
    });

    it('should expand single-channel input', () => {
      const frame = toBgrFrame(Buffer.from([1, 2]), 2, 1, 1, { index: 0, isKeyframe: false });

      expect(frame.data).toEqual(Buffer.from([1, 1, 1, 2, 2, 2]));
      expect(frame.data.length).toBe(frame.width * frame.height * frame.channels);
    });

    it('should reject a buffer that does not match the dimensions', () => {
      expect(() => toBgrFrame(Buffer.alloc(5), 1, 2, 3, { index: 0, isKeyframe: true })).toThrow(
        'Pixel buffer holds 5 bytes, expected 6'
      );
    });

    it('should reject non-positive dimensions', () => {
      expect(() => toBgrFrame(Buffer.alloc(0), 0, 2, 3, { index: 0, isKeyframe: true })).toThrow(
        'Invalid frame dimensions 0x2'
      );
    });

    it('should reject an unsupported channel count', () => {
      expect(() => toBgrFrame(Buffer.alloc(4), 1, 1, 4, { index: 0, isKeyframe: true })).toThrow(
        'Unsupported channel count 4'
      );
    });
  });
});
