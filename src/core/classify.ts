import { HTTPError, type HTTPErrorKind } from '../error/httpError.js';
import { isRecord, tryParse } from '../utils/tryParse.js';

/** Kind and base message per status, first match wins. */
const STATUS_RULES: ReadonlyArray<{ match: (status: number) => boolean; kind: HTTPErrorKind; message: string }> = [
  { match: (status) => status === 401, kind: 'authentication', message: 'Authentication failed. Please check your API key.' },
  {
    match: (status) => status === 403,
    kind: 'authorization',
    message: "Access forbidden. You don't have permission to access this resource.",
  },
  { match: (status) => status === 404, kind: 'not_found', message: 'Resource not found.' },
  { match: (status) => status === 422, kind: 'validation', message: 'Validation error. Please check your request data.' },
  { match: (status) => status === 429, kind: 'rate_limit', message: 'Rate limit exceeded. Please try again later.' },
  { match: (status) => status >= 500, kind: 'server', message: 'Server error occurred. Please try again later.' },
];

/** Whether a body field carries something to report. */
export function isProvided(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

/**
 * Renders an API-provided field for a message, strings as-is and anything else as JSON.
 */
export function describeField(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Classifies a failed response (status >= 400) into an {@link HTTPError}:
 * 401 authentication, 403 authorization, 404 not_found, 422 validation,
 * 429 rate_limit, >= 500 server, any other status http.
 *
 * The body is parsed on a best-effort basis; a `message` (or else `errors`)
 * field is folded into the error message. The raw text is always kept.
 */
export function classifyResponse(status: number, rawBody: string | null, url: string): HTTPError {
  const rule = STATUS_RULES.find((candidate) => candidate.match(status));
  const [, parsed] = tryParse(rawBody);

  let message = `HTTP ${status} error for ${url}: ${rule?.message ?? 'HTTP error occurred'}`;
  if (isRecord(parsed)) {
    if (isProvided(parsed.message)) {
      message += ` - API message: ${describeField(parsed.message)}`;
    } else if (isProvided(parsed.errors)) {
      message += ` - API errors: ${describeField(parsed.errors)}`;
    }
  }

  return new HTTPError(message, rule?.kind ?? 'http', {
    statusCode: status,
    rawBody,
    url,
    responseData: parsed,
  });
}

/**
 * Classifies a failure below the HTTP layer (refused connection, DNS, deadline)
 * as an `http` kind {@link HTTPError} without status code.
 */
export function classifyTransportError(error: Error, url: string): HTTPError {
  return new HTTPError(
    `Network error occurred: ${error.message}`,
    'http',
    { statusCode: null, rawBody: error.message, url },
    { cause: error },
  );
}
