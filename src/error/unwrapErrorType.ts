/** Any error class, regardless of its constructor arguments. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * Matches by `instanceof`.
 * Stops on cause cycles.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}

/**
 * Checks if an unknown error is, or wraps, a specific error class.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): boolean {
  return unwrapErrorType(errorClass, err) !== null;
}
