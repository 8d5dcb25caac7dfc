import { ApiError, type ApiErrorDetails } from './apiError.js';
import { isErrorType, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a successful response cannot be parsed as JSON, or its
 * unwrapped value does not match the action's result shape.
 */
export class ResponseParseError extends ApiError {
  /** ResponseParseError error-name */
  static name = 'ResponseParseError';

  /** Creates a new instance of a ResponseParseError, appending the cause's message */
  constructor(message: string, details: ApiErrorDetails = {}, opts?: ErrorOptions) {
    let detailed = `Failed to parse API response: ${message}`;
    if (opts?.cause instanceof Error) {
      detailed += ` (Original error: ${opts.cause.message})`;
    }

    super(detailed, 'response_parse', details, opts);
  }
}

/**
 * Checks whether an error is, or wraps, a {@link ResponseParseError}.
 */
export function isResponseParseError(error: unknown): boolean {
  return isErrorType(ResponseParseError, error);
}

/**
 * Extract a {@link ResponseParseError} from an unknown error value, following nested causes.
 */
export function getResponseParseError(error: unknown): null | ResponseParseError {
  return unwrapErrorType(ResponseParseError, error);
}
