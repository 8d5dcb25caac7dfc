/**
 * Error entrypoint: exports the classified errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the engine.
 * @module
 */

/** Error thrown when a request is aborted via AbortController. */
/** Checks whether an error is, or wraps, an {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';

/** Base class for classified failures, with its kind discriminant. */
export { ApiError, getApiError, isApiError } from './apiError.js';
export type { ApiErrorDetails, ErrorKind } from './apiError.js';

/** Error for disallowed or misconfigured actions and invalid configuration. */
export { ConfigurationError, isConfigurationError } from './configurationError.js';
export type { ConfigurationErrorDetails } from './configurationError.js';

/** Error representing a failed HTTP exchange. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
export type { HTTPErrorDetails, HTTPErrorKind } from './httpError.js';

/** Error for a response body missing the action's unwrap key. */
export { isResponseKeyError, ResponseKeyError } from './responseKeyError.js';
export type { ResponseKeyErrorDetails } from './responseKeyError.js';

/** Error for bodies that are not JSON or do not match the result shape. */
export { getResponseParseError, isResponseParseError, ResponseParseError } from './responseParseError.js';

/** Error thrown when a request exceeds the configured timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { isErrorType, unwrapErrorType } from './unwrapErrorType.js';
export type { ErrorClass } from './unwrapErrorType.js';

/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
