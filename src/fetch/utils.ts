import type { HeaderOptions } from '../types/request.js';

/**
 * Normalizes the different header container shapes into `[name, value]` pairs.
 */
function toEntries(headers: HeaderOptions | undefined): Array<[string, string | null | undefined]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return [...headers.entries()];
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge header layers into a single `Headers` instance, later layers winning.
 * A `null` or `undefined` value removes whatever an earlier layer set.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const [key, value] of layers.flatMap(toEntries)) {
    if (value === null || value === undefined) {
      merged.delete(key);
      continue;
    }

    merged.set(key, value);
  }

  return merged;
}
