import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Validation is synchronous: a schema that answers with a Promise is rejected,
 * so unwrapping never suspends.
 *
 * - A schema that throws yields `ValidationError('error validating on validation start')` with the thrown error as cause.
 * - An async schema yields `ValidationError('error async schema validation is not supported')`.
 * - A result with `issues` yields `ValidationError('error validating data')` carrying those issues.
 * - Otherwise returns `[null, result.value]`.
 */
export function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrap<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new ValidationError('error async schema validation is not supported', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
