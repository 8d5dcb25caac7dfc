import { ResponseParseError } from '../error/responseParseError.js';
import type { RawResponse } from '../types/request.js';
import { tryParse } from './tryParse.js';
import type { SafeWrap } from './wrap.js';

/**
 * Extracts the JSON body of a successful response.
 *
 * - Status 204 and 205 carry no body and yield `[null, null]`, as does an empty text.
 * - Malformed JSON yields a {@link ResponseParseError} keeping the raw text and the
 *   parser's error as `cause`.
 */
export function getResponseData(response: RawResponse): SafeWrap<ResponseParseError, unknown> {
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  const [errJson, json] = tryParse(response.body);
  if (errJson) {
    return [
      new ResponseParseError(
        'Unable to parse response as JSON',
        { statusCode: response.status, rawBody: response.body, url: response.url },
        { cause: errJson },
      ),
      null,
    ];
  }

  return [null, json];
}
