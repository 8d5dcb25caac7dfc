import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Renders one issue as `path: message`, with `<root>` for issues without a path.
 */
function formatIssue(issue: StandardSchemaV1.Issue): string {
  const segments = (issue.path ?? []).map((segment) =>
    typeof segment === 'object' ? String(segment.key) : String(segment),
  );

  return `${segments.length > 0 ? segments.join('.') : '<root>'}: ${issue.message}`;
}

/**
 * Error representing a Standard Schema validation failure, listing each
 * per-field problem.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static name = 'ValidationError';
  /** Schema validation issues */
  #issues: StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError with accompanying issues */
  constructor(message: string, issues: ReadonlyArray<StandardSchemaV1.Issue>, opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}; ${issues.map(formatIssue).join('; ')}` : message, opts);
    this.#issues = [...issues];
  }

  get issues(): StandardSchemaV1.Issue[] {
    return [...this.#issues];
  }
}

/**
 * Checks whether an error is, or wraps, a {@link ValidationError}.
 */
export function isValidationError(error: unknown): boolean {
  return isErrorType(ValidationError, error);
}

/**
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
