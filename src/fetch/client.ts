import type { ExecutorRequest, HeaderOptions, RawResponse, RequestExecutor } from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { createCallSignal } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchExecutor}. */
export interface FetchExecutorOptions {
  /** Sent as `Authorization: Bearer <apiKey>` on every request. */
  apiKey: string;
  /** Extra default headers, merged over the executor's own. */
  headers?: HeaderOptions;
  /**
   * Per-call deadline in milliseconds, `false` to disable.
   * @default 30000
   */
  timeout?: number | false;
}

/**
 * {@link RequestExecutor} over the native `fetch` API that:
 * - prefixes all request paths with a configured base URL,
 * - authenticates with a bearer credential and speaks JSON,
 * - scopes a deadline signal to each call and releases it when the call settles,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Every status comes back as a {@link RawResponse}; only failures below the HTTP
 * layer land in the error slot.
 */
export class FetchExecutor implements RequestExecutor {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Default headers sent with every request. */
  #headers: Headers;
  /** Per-call deadline. */
  #timeout: number | false;

  /** Creates a new executor bound to a base URL and credential */
  constructor(baseUrl: string, opts: FetchExecutorOptions) {
    this.#baseUrl = baseUrl;
    this.#timeout = opts.timeout ?? 30_000;
    this.#headers = mergeHeaderOptions(
      {
        Accept: 'application/json',
        Authorization: `Bearer ${opts.apiKey}`,
      },
      opts.headers,
    );
  }

  /**
   * Sends one request and reads its body as text.
   *
   * Errors:
   * - Network / fetch errors (including an elapsed deadline) are wrapped in `Error`.
   * - Failures reading the body are wrapped in `Error`.
   *
   * @param request - Request built by a resource handle.
   * @returns A promise resolving to `[error, response]`.
   */
  async execute(request: ExecutorRequest): SafeWrapAsync<Error, RawResponse> {
    const url = constructUrl(this.#baseUrl, request.path, request.query);
    const hasBody = request.body !== undefined;
    const headers = mergeHeaderOptions(this.#headers, hasBody ? { 'Content-Type': 'application/json' } : undefined);
    const { signal, dispose } = createCallSignal(this.#timeout, request.signal);

    try {
      const [errFetch, response] = await safeWrapAsync(() =>
        fetch(url, {
          method: request.method,
          headers,
          ...(hasBody && { body: JSON.stringify(request.body) }),
          ...(signal && { signal }),
        }),
      );

      if (errFetch) {
        return [new Error(`error in ${request.method} request to ${url}`, { cause: errFetch }), null];
      }

      const [errText, text] = await safeWrapAsync(() => response.text());
      if (errText) {
        return [new Error(`error reading ${request.method} response body from ${url}`, { cause: errText }), null];
      }

      return [null, { status: response.status, url, body: text === '' ? null : text }];
    } finally {
      dispose();
    }
  }
}
