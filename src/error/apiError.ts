import { isErrorType, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Discriminant carried by every {@link ApiError}.
 *
 * Status-driven kinds come from the response classifier, `response_parse` from
 * body parsing/validation and `configuration` from the action registry.
 */
export type ErrorKind =
  | 'authentication'
  | 'authorization'
  | 'not_found'
  | 'validation'
  | 'rate_limit'
  | 'server'
  | 'http'
  | 'response_parse'
  | 'configuration';

/** Diagnostic context attached to an {@link ApiError}. */
export interface ApiErrorDetails {
  /** HTTP status of the failed response, `null` below the HTTP layer. */
  statusCode?: number | null;
  /** Raw response text (or stringified candidate) kept verbatim. */
  rawBody?: string | null;
  /** URL (or path) the failing request targeted. */
  url?: string | null;
}

/**
 * Base class for every classified failure surfaced by a resource handle.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  static name = 'ApiError';

  #kind: ErrorKind;
  #statusCode: number | null;
  #rawBody: string | null;
  #url: string | null;

  /** Creates a new classified error with its kind and diagnostic context */
  constructor(message: string, kind: ErrorKind, details: ApiErrorDetails = {}, opts?: ErrorOptions) {
    super(message, opts);
    this.#kind = kind;
    this.#statusCode = details.statusCode ?? null;
    this.#rawBody = details.rawBody ?? null;
    this.#url = details.url ?? null;
  }

  /** Kind to branch on programmatically */
  get kind(): ErrorKind {
    return this.#kind;
  }

  get statusCode(): number | null {
    return this.#statusCode;
  }

  get rawBody(): string | null {
    return this.#rawBody;
  }

  get url(): string | null {
    return this.#url;
  }
}

/**
 * Checks whether an error is, or wraps, a {@link ApiError}.
 */
export function isApiError(error: unknown): boolean {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): null | ApiError {
  return unwrapErrorType(ApiError, error);
}
