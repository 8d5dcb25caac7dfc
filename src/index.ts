/**
 * Root entrypoint for actiontable: re-exports the engine, the fetch executor, types, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';
export * from './error/index.js';

/** Default request executor over `fetch`. */
export { FetchExecutor } from './fetch/client.js';
export type { FetchExecutorOptions } from './fetch/client.js';

/** Executor contract and request/response shapes. */
export type {
  CallOptions,
  ExecutorRequest,
  HeaderOptions,
  HttpMethod,
  RawResponse,
  RequestExecutor,
} from './types/request.js';

export type { QueryParams } from './utils/constructUrl.js';

/** Tuple-based results returned by every operation. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
