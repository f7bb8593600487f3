/**
 * Tests for stream and timing helpers
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { TimeoutError, toBuffer, withTimeout } from '../../src/utils/streamUtils';

describe('streamUtils', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('withTimeout', () => {
    it('should resolve with the value of a fast promise', async () => {
      await expect(withTimeout(Promise.resolve('done'), 100)).resolves.toBe('done');
    });

    it('should reject with TimeoutError when the promise is too slow', async () => {
      vi.useFakeTimers();
      const pending = withTimeout(new Promise<never>(() => undefined), 50, 'too slow');
      const assertion = expect(pending).rejects.toThrow(new TimeoutError('too slow', 50));

      await vi.advanceTimersByTimeAsync(50);
      await assertion;
    });

    it('should pass the original rejection through', async () => {
      await expect(withTimeout(Promise.reject(new Error('failed')), 100)).rejects.toThrow('failed');
    });

    it('should clear its timer once settled', async () => {
      vi.useFakeTimers();

      await withTimeout(Promise.resolve(1), 1000);

      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('toBuffer', () => {
    it('should normalize stream chunks', () => {
      const buffer = Buffer.from([1, 2]);

      expect(toBuffer(buffer)).toBe(buffer);
      expect(toBuffer(new Uint8Array([3, 4]))).toEqual(Buffer.from([3, 4]));
      expect(toBuffer('P6')).toEqual(Buffer.from('P6'));
    });

    it('should reject anything else', () => {
      expect(() => toBuffer(12)).toThrow('Unexpected stream chunk of type number');
    });
  });
});
