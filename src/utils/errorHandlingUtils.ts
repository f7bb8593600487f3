/**
 * Utility functions for standardized error handling across the decoder.
 *
 * I/O failures from Node come back as plain errors with an errno code; these
 * helpers tell them apart from the decoder's own tagged errors so callers
 * can wrap the first and pass the second through unchanged.
 */
import { isMediaError, type MediaError } from '../errors';

/**
 * Check whether a thrown value is a Node system error (ENOENT, EACCES, EISDIR, ...)
 */
export function isSystemError(err: unknown): err is NodeJS.ErrnoException {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    'syscall' in err
  );
}

/**
 * Rethrow tagged errors as they are, wrap system I/O errors, rethrow anything else
 *
 * @param err - The caught value
 * @param wrap - Builds the tagged error for an I/O failure
 */
export function rethrowWrappingIoErrors(
  err: unknown,
  wrap: (cause: NodeJS.ErrnoException) => MediaError
): never {
  if (isMediaError(err)) {
    throw err;
  }
  if (isSystemError(err)) {
    throw wrap(err);
  }
  throw err;
}

/**
 * Extract a printable message from any thrown value
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
