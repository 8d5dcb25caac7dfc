/**
 * Core entrypoint: exports the client, the resource factory and handle, and the action table types.
 * Import from here if you only need the engine without error helpers.
 * @module
 */

/**
 * Client owning the shared executor and the configured resources.
 */
export { ApiClient } from './client.js';
export type { ApiClientProps } from './client.js';

/** Connection settings and their resolution. */
export { ENVIRONMENT_URLS, resolveConfig } from './config.js';
export type { ClientConfig, Environment, ResolvedConfig } from './config.js';

/** Builds a typed handle for one endpoint from its action table. */
export { createResource, resolveResource, subactionMethod } from './factory.js';

/** Typed client for one REST resource. */
export { ResourceHandle } from './resource.js';

/** Status and transport failure classification. */
export { classifyResponse, classifyTransportError } from './classify.js';

/** Response unwrapping and validation. */
export { unwrapAndValidate } from './unwrap.js';
export type { UnwrapContext, UnwrapTarget } from './unwrap.js';

/** Wire preparation for write payloads. */
export { preparePayload } from './payload.js';

/**
 * Action table shapes consumed by {@link createResource} and {@link ApiClient}.
 */
export { SUBACTION_PREFIX } from './types.js';
export type {
  ActionInput,
  ActionOutput,
  EntityActionDefinition,
  ListActionDefinition,
  ResourceActions,
  ResourceDefinition,
  ResourceDefinitions,
  SchemaType,
  SubactionDefinition,
  SubactionKey,
  WriteActionDefinition,
} from './types.js';
