import { isErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the caller abandons a request through its AbortSignal
 * without giving a reason of its own.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static name = 'AbortError';
}

/**
 * Checks whether an error is, or wraps, an {@link AbortError}.
 */
export function isAbortError(error: unknown): boolean {
  return isErrorType(AbortError, error);
}
