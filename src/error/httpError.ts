import { ApiError, type ApiErrorDetails, type ErrorKind } from './apiError.js';
import { isErrorType, unwrapErrorType } from './unwrapErrorType.js';

/** Kinds an {@link HTTPError} can carry. */
export type HTTPErrorKind = Extract<
  ErrorKind,
  'authentication' | 'authorization' | 'not_found' | 'validation' | 'rate_limit' | 'server' | 'http'
>;

/** Context for an {@link HTTPError}, adding the parsed error body. */
export interface HTTPErrorDetails extends ApiErrorDetails {
  /** Error body parsed as JSON, when it parsed. */
  responseData?: unknown;
}

/**
 * Error representing a failed HTTP exchange: a status >= 400, or a transport
 * failure below the HTTP layer (kind `http`, no status code).
 */
export class HTTPError extends ApiError {
  /** HTTPError error-name */
  static name = 'HTTPError';

  /** Parsed body of the failed response */
  #responseData: unknown;

  /** Creates a new instance of a HTTPError with its classified kind */
  constructor(message: string, kind: HTTPErrorKind, details: HTTPErrorDetails = {}, opts?: ErrorOptions) {
    super(message, kind, details, opts);
    this.#responseData = details.responseData ?? null;
  }

  /**
   * Parsed error body, `null` when the body was empty or not JSON.
   */
  get responseData(): unknown {
    return this.#responseData;
  }
}

/**
 * Extracts an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}

/**
 * Checks whether an error is, or wraps, a {@link HTTPError}.
 */
export function isHttpError(error: unknown): boolean {
  return isErrorType(HTTPError, error);
}
