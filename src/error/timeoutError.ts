import { isErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request exceeds the executor's per-call deadline.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
  #timeout: number;

  /** Creates a new instance of a TimeoutError for the elapsed deadline */
  constructor(timeout: number, opts?: ErrorOptions) {
    super(`error request timed out after ${timeout}ms`, opts);
    this.#timeout = timeout;
  }

  /** Deadline in milliseconds that elapsed */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Checks whether an error is, or wraps, a {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): boolean {
  return isErrorType(TimeoutError, error);
}
