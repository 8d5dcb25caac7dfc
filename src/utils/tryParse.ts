import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Parses a response text as JSON.
 *
 * `null`, empty and whitespace-only input count as "no body" and yield `[null, null]`.
 * Malformed JSON yields the parser's `SyntaxError`. Never throws.
 */
export function tryParse(input: string | null): SafeWrap<Error, unknown> {
  if (input === null || input.trim() === '') {
    return [null, null];
  }

  return safeWrap<unknown>(() => JSON.parse(input));
}

/** Narrows a parsed value to a plain JSON object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
