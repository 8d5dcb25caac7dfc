/**
 * Fetch entrypoint: exports the default request executor and its options.
 * @module
 */
export { FetchExecutor } from './client.js';
export type { FetchExecutorOptions } from './client.js';
