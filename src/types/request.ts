import type { QueryParams } from '../utils/constructUrl.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** HTTP verbs the engine dispatches. */
export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/** Header options accepted by the fetch executor; `null` removes a default header. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

/** One request as built by a resource handle. */
export interface ExecutorRequest {
  method: HttpMethod;
  /** Path relative to the executor's base URL, e.g. `invoices/42/files/XML`. */
  path: string;
  /** JSON-serializable body; omitted entirely when absent. */
  body?: unknown;
  query?: QueryParams;
  /** Caller's signal for abandoning the call. */
  signal?: AbortSignal;
}

/**
 * Raw outcome of one request, consumed immediately by the dispatcher.
 */
export interface RawResponse {
  status: number;
  /** Absolute URL the request was sent to. */
  url: string;
  /** Response text, `null` when there was none. */
  body: string | null;
}

/**
 * Capability the engine injects to send requests.
 *
 * Transport failures (refused connections, DNS, deadlines) come back as the
 * error slot; any HTTP status, including >= 400, comes back as a response.
 */
export interface RequestExecutor {
  execute: (request: ExecutorRequest) => SafeWrapAsync<Error, RawResponse>;
}

/** Per-call options accepted by every resource operation. */
export interface CallOptions {
  /** Signal to abandon the call. */
  signal?: AbortSignal;
}
