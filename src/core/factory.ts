import { ConfigurationError } from '../error/configurationError.js';
import type { RequestExecutor } from '../types/request.js';
import { isRecord } from '../utils/tryParse.js';
import type { SafeWrap } from '../utils/wrap.js';
import { ResourceHandle } from './resource.js';
import { type ResolvedAction, type ResourceActions, SUBACTION_PREFIX, type SchemaType } from './types.js';

/** Verb per entity action; subactions follow {@link subactionMethod}. */
const ENTITY_METHODS = {
  get: 'GET',
  create: 'POST',
  update: 'PATCH',
} as const;

/** Subactions sent as POST when their definition names no verb. */
const POST_SUBACTIONS: ReadonlySet<string> = new Set(['replace', 'cancel']);

/** Verb rule for subactions: POST for `replace` and `cancel`, GET otherwise. */
export function subactionMethod(subaction: string): 'GET' | 'POST' {
  return POST_SUBACTIONS.has(subaction) ? 'POST' : 'GET';
}

/** Narrows a value to a Standard Schema validator. */
function isSchema(value: unknown): value is SchemaType {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null || !('~standard' in value)) {
    return false;
  }

  const props = value['~standard'];
  return isRecord(props) && typeof props.validate === 'function';
}

/** Reads an optional non-empty string option. */
function optionalString(definition: Record<string, unknown>, key: string): SafeWrap<string, string | null> {
  const value = definition[key];
  if (value === undefined) {
    return [null, null];
  }

  if (typeof value !== 'string' || value.trim() === '') {
    return [`'${key}' must be a non-empty string`, null];
  }

  return [null, value];
}

/**
 * Resolves one table entry into its tagged variant.
 */
function resolveAction(endpoint: string, name: string, definition: unknown): SafeWrap<ConfigurationError, ResolvedAction> {
  const fail = (reason: string): SafeWrap<ConfigurationError, ResolvedAction> => [
    new ConfigurationError(`The action '${name}' for ${endpoint} is misconfigured: ${reason}`, { action: name, endpoint }),
    null,
  ];

  if (!isRecord(definition)) {
    return fail('definition must be an object');
  }

  if (name === 'delete') {
    return [null, { type: 'delete', name: 'delete', method: 'DELETE' }];
  }

  const isSubaction = name.startsWith(SUBACTION_PREFIX) && name.length > SUBACTION_PREFIX.length;
  if (!isSubaction && name !== 'list' && !Object.hasOwn(ENTITY_METHODS, name)) {
    return [new ConfigurationError(`Unknown action '${name}' for ${endpoint}`, { action: name, endpoint }), null];
  }

  if (!('response' in definition) || (definition.response !== null && !isSchema(definition.response))) {
    return fail('declare a response schema, or opt out of validation with response: null');
  }

  const response = isSchema(definition.response) ? definition.response : null;
  const [errKey, responseKey] = optionalString(definition, 'responseKey');
  if (errKey) {
    return fail(errKey);
  }

  if (name === 'list') {
    return [null, { type: 'collection', name: 'list', method: 'GET', responseKey, response }];
  }

  if (definition.request !== undefined && !isSchema(definition.request)) {
    return fail("'request' must be a schema");
  }

  const request = isSchema(definition.request) ? definition.request : null;
  if (name === 'get' || name === 'create' || name === 'update') {
    return [
      null,
      { type: 'entity', name, method: ENTITY_METHODS[name], suffix: null, responseKey, response, request },
    ];
  }

  const subaction = name.slice(SUBACTION_PREFIX.length);
  const [errSuffix, endpointSuffix] = optionalString(definition, 'endpointSuffix');
  if (errSuffix) {
    return fail(errSuffix);
  }

  let method = subactionMethod(subaction);
  if (definition.method === 'GET' || definition.method === 'POST') {
    method = definition.method;
  } else if (definition.method !== undefined) {
    return fail("'method' must be GET or POST");
  }

  return [
    null,
    {
      type: 'entity',
      name,
      method,
      suffix: endpointSuffix ?? subaction,
      responseKey,
      response,
      request,
    },
  ];
}

/**
 * Resolves a whole action table, failing on the first malformed entry.
 */
export function resolveActions(
  endpoint: string,
  actions: object,
): SafeWrap<ConfigurationError, ReadonlyMap<string, ResolvedAction>> {
  const resolved = new Map<string, ResolvedAction>();
  const entries: Array<[string, unknown]> = Object.entries(actions);

  for (const [name, definition] of entries) {
    if (definition === undefined) {
      continue;
    }

    const [errAction, action] = resolveAction(endpoint, name, definition);
    if (errAction) {
      return [errAction, null];
    }

    resolved.set(name, action);
  }

  return [null, resolved];
}

/** A resource checked and resolved, ready to back handles. */
export interface ResolvedResource {
  /** Endpoint without leading or trailing slash. */
  endpoint: string;
  actions: ReadonlyMap<string, ResolvedAction>;
}

/**
 * Checks an endpoint and resolves its action table. Accepts tables built at
 * run time, e.g. from parsed configuration, and checks each entry.
 */
export function resolveResource(endpoint: string, actions: object): SafeWrap<ConfigurationError, ResolvedResource> {
  const path = endpoint.trim().replace(/^\/+|\/+$/g, '');
  if (!path) {
    return [new ConfigurationError('Resource endpoint cannot be empty', { endpoint }), null];
  }

  const [errActions, resolved] = resolveActions(path, actions);
  if (errActions) {
    return [errActions, null];
  }

  return [null, { endpoint: path, actions: resolved }];
}

/**
 * Builds a {@link ResourceHandle} for an endpoint from its action table.
 *
 * Pure construction: checks the table is well formed, sends nothing.
 *
 * @example
 * const [err, invoices] = createResource('invoices', executor, {
 *   get: { response: Invoice, responseKey: 'invoice' },
 *   perform__file_xml: { response: FileResponse, responseKey: 'file', endpointSuffix: 'files/XML' },
 * });
 */
export function createResource<Actions extends ResourceActions>(
  endpoint: string,
  executor: RequestExecutor,
  actions: Actions,
): SafeWrap<ConfigurationError, ResourceHandle<Actions>> {
  const [errResource, resource] = resolveResource(endpoint, actions);
  if (errResource) {
    return [errResource, null];
  }

  return [null, new ResourceHandle<Actions>(resource.endpoint, resource.actions, executor)];
}
