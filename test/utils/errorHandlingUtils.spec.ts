/**
 * Tests for error handling helpers
 */
import { describe, it, expect } from 'vitest';
import { getErrorMessage, isSystemError, rethrowWrappingIoErrors } from '../../src/utils/errorHandlingUtils';
import { DecodeError, MediaNotFoundError } from '../../src/errors';

function systemError(code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`${code}: failed`);
  err.code = code;
  err.syscall = 'open';
  return err;
}

describe('errorHandlingUtils', () => {
  it('should recognise Node system errors', () => {
    expect(isSystemError(systemError('ENOENT'))).toBe(true);
    expect(isSystemError(new Error('plain'))).toBe(false);
    expect(isSystemError({ code: 'ENOENT', syscall: 'open' })).toBe(false);
  });

  describe('rethrowWrappingIoErrors', () => {
    const wrap = (cause: NodeJS.ErrnoException) => MediaNotFoundError.unreadable(1, '/media/a.png', cause);

    it('should wrap system errors', () => {
      expect(() => rethrowWrappingIoErrors(systemError('EACCES'), wrap)).toThrow(MediaNotFoundError);
    });

    it('should rethrow media errors unchanged', () => {
      const original = DecodeError.imageUndecodable();

      expect(() => rethrowWrappingIoErrors(original, wrap)).toThrow(original);
    });

    it('should rethrow anything else unchanged', () => {
      const original = new TypeError('bug');

      expect(() => rethrowWrappingIoErrors(original, wrap)).toThrow(original);
    });
  });

  it('should extract messages', () => {
    expect(getErrorMessage(new Error('broken'))).toBe('broken');
    expect(getErrorMessage('text')).toBe('text');
  });
});
