import { ApiError } from '../error/apiError.js';
import { ResponseKeyError } from '../error/responseKeyError.js';
import { ResponseParseError } from '../error/responseParseError.js';
import { isRecord } from '../utils/tryParse.js';
import { validator } from '../utils/validator.js';
import type { SafeWrap } from '../utils/wrap.js';
import { describeField, isProvided } from './classify.js';
import type { SchemaOutput, SchemaType } from './types.js';

/** The parts of an action that drive unwrapping. */
export interface UnwrapTarget {
  responseKey: string | null;
  response: SchemaType | null;
}

/** Where the body came from, for error context. */
export interface UnwrapContext {
  action: string;
  endpoint: string;
  statusCode: number;
  url: string;
}

/**
 * Stringifies a value for error context, falling back to `String` for values
 * JSON cannot represent.
 */
export function stringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Picks the first of `message`, `errors` or `error` the body exposes.
 */
function diagnosticOf(body: Record<string, unknown>): string | null {
  for (const field of ['message', 'errors', 'error']) {
    if (isProvided(body[field])) {
      return describeField(body[field]);
    }
  }

  return null;
}

/**
 * Takes the value stored under the action's response key, or the whole body
 * when it has none. A missing key is an error whatever the status was.
 */
export function unwrap(body: unknown, target: UnwrapTarget, context: UnwrapContext): SafeWrap<ApiError, unknown> {
  if (target.responseKey === null) {
    return [null, body];
  }

  if (isRecord(body) && Object.hasOwn(body, target.responseKey)) {
    return [null, body[target.responseKey]];
  }

  return [
    new ResponseKeyError(target.responseKey, {
      action: context.action,
      endpoint: context.endpoint,
      availableKeys: isRecord(body) ? Object.keys(body) : [],
      diagnostic: isRecord(body) ? diagnosticOf(body) : null,
      statusCode: context.statusCode,
      rawBody: stringify(body),
      url: context.url,
    }),
    null,
  ];
}

/**
 * Validates an unwrapped candidate against a result shape. Without a shape the
 * candidate passes through untouched.
 *
 * @param label - What was validated, e.g. `get` or `list[2]`.
 */
export function validateCandidate(
  candidate: unknown,
  response: SchemaType | null,
  label: string,
  context: UnwrapContext,
): SafeWrap<ApiError, SchemaOutput> {
  if (response === null) {
    return [null, candidate];
  }

  const [errValidate, validated] = validator(candidate, response);
  if (errValidate) {
    return [
      new ResponseParseError(
        `${label} response for ${context.endpoint} does not match its result shape`,
        { statusCode: context.statusCode, rawBody: stringify(candidate), url: context.url },
        { cause: errValidate },
      ),
      null,
    ];
  }

  return [null, validated];
}

/**
 * Unwraps a parsed response body by the action's key, then validates the
 * candidate into the action's result shape.
 *
 * Pure: no I/O, no suspension.
 */
export function unwrapAndValidate(
  body: unknown,
  target: UnwrapTarget,
  context: UnwrapContext,
): SafeWrap<ApiError, SchemaOutput> {
  const [errUnwrap, candidate] = unwrap(body, target, context);
  if (errUnwrap) {
    return [errUnwrap, null];
  }

  return validateCandidate(candidate, target.response, context.action, context);
}
