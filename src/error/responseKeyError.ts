import { HTTPError } from './httpError.js';
import { isErrorType } from './unwrapErrorType.js';

/** Context for a {@link ResponseKeyError}. */
export interface ResponseKeyErrorDetails {
  action: string;
  endpoint: string;
  /** Top-level keys the body did expose. */
  availableKeys: string[];
  /** Text taken from the body's `message`, `errors` or `error` field. */
  diagnostic?: string | null;
  statusCode?: number | null;
  rawBody?: string | null;
  url?: string | null;
}

/**
 * Error raised when a response body lacks the key an action unwraps,
 * regardless of the response status.
 */
export class ResponseKeyError extends HTTPError {
  /** ResponseKeyError error-name */
  static name = 'ResponseKeyError';

  #key: string;
  #action: string;
  #endpoint: string;
  #availableKeys: string[];

  /** Creates a new instance of a ResponseKeyError for the missing key */
  constructor(key: string, details: ResponseKeyErrorDetails, opts?: ErrorOptions) {
    let message = `error response key '${key}' not found in ${details.action} response for ${details.endpoint}`;
    if (details.diagnostic) {
      message += `: ${details.diagnostic}`;
    }

    if (details.availableKeys.length > 0) {
      message += ` (available keys: ${details.availableKeys.join(', ')})`;
    }

    super(message, 'http', details, opts);
    this.#key = key;
    this.#action = details.action;
    this.#endpoint = details.endpoint;
    this.#availableKeys = [...details.availableKeys];
  }

  /** Unwrap key that was missing */
  get key(): string {
    return this.#key;
  }

  get action(): string {
    return this.#action;
  }

  get endpoint(): string {
    return this.#endpoint;
  }

  get availableKeys(): string[] {
    return [...this.#availableKeys];
  }
}

/**
 * Checks whether an error is, or wraps, a {@link ResponseKeyError}.
 */
export function isResponseKeyError(error: unknown): boolean {
  return isErrorType(ResponseKeyError, error);
}
