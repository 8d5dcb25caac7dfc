/** Query parameters passed verbatim to the request URL. */
export type QueryParams = Record<string, string>;

/**
 * Joins path segments into a relative request path.
 *
 * Leading and trailing slashes of each segment are dropped, so `files/XML`
 * style suffixes keep their inner slash. Empty segments are skipped.
 */
export function joinPath(...segments: string[]): string {
  return segments
    .map((segment) => segment.replace(/^\/+|\/+$/g, ''))
    .filter((segment) => segment.length > 0)
    .join('/');
}

/**
 * Resolves a relative path and optional query against a base URL.
 *
 * Query values are appended in insertion order without alteration.
 */
export function constructUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  let result = `${base}${path.replace(/^\//, '')}`;

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(query ?? {})) {
    searchParams.append(key, value);
  }

  const search = searchParams.toString();
  if (search) {
    result += `?${search}`;
  }

  return result;
}
