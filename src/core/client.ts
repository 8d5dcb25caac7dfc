import type { ConfigurationError } from '../error/configurationError.js';
import { FetchExecutor } from '../fetch/client.js';
import type { HeaderOptions, RequestExecutor } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';
import { type ClientConfig, type ResolvedConfig, resolveConfig } from './config.js';
import { type ResolvedResource, resolveResource } from './factory.js';
import { ResourceHandle } from './resource.js';
import type { ResourceDefinitions } from './types.js';

/** Configuration for constructing an {@link ApiClient}, extends {@link ClientConfig}. */
export interface ApiClientProps<Resources extends ResourceDefinitions> extends ClientConfig {
  /**
   * Map of resource definitions: endpoint path plus action table per resource.
   */
  resources: Resources;
  /** Executor used by every resource. Defaults to a {@link FetchExecutor} built from the config. */
  executor?: RequestExecutor;
  /** Extra default headers for the default executor. */
  headers?: HeaderOptions;
}

/**
 * Client owning one executor and the resources served through it:
 * - checks connection settings and every action table up front,
 * - shares a single executor across all resource handles,
 * - hands out typed {@link ResourceHandle}s by resource name.
 *
 * @typeParam Resources - The map of resource definitions available to the client.
 */
export class ApiClient<Resources extends ResourceDefinitions> {
  /** Connection settings after defaults. */
  #config: ResolvedConfig;
  /** Executor shared by every handle. */
  #executor: RequestExecutor;
  /** Endpoints and action tables resolved once per resource. */
  #resolved: ReadonlyMap<string, ResolvedResource>;

  private constructor(
    config: ResolvedConfig,
    executor: RequestExecutor,
    resolved: ReadonlyMap<string, ResolvedResource>,
  ) {
    this.#config = config;
    this.#executor = executor;
    this.#resolved = resolved;
  }

  /**
   * Resolves the configuration and every resource's action table, returning
   * the first {@link ConfigurationError} found.
   *
   * @example
   * const [err, client] = ApiClient.create({
   *   apiKey: 'test-key',
   *   environment: 'sandbox',
   *   resources: { invoices: { endpoint: 'invoices', actions: { get: { response: Invoice, responseKey: 'invoice' } } } },
   * });
   */
  static create<Resources extends ResourceDefinitions>(
    props: ApiClientProps<Resources>,
  ): SafeWrap<ConfigurationError, ApiClient<Resources>> {
    const { resources, executor, headers, ...connection } = props;
    const [errConfig, config] = resolveConfig(connection);
    if (errConfig) {
      return [errConfig, null];
    }

    const sharedExecutor =
      executor ?? new FetchExecutor(config.baseUrl, { apiKey: config.apiKey, timeout: config.timeout, headers });

    const definitions: ResourceDefinitions = resources;
    const resolved = new Map<string, ResolvedResource>();
    for (const [name, definition] of Object.entries(definitions)) {
      const [errResource, resource] = resolveResource(definition.endpoint, definition.actions);
      if (errResource) {
        return [errResource, null];
      }

      resolved.set(name, resource);
    }

    return [null, new ApiClient(config, sharedExecutor, resolved)];
  }

  /** Environment the client talks to. */
  get environment(): ResolvedConfig['environment'] {
    return this.#config.environment;
  }

  /** Base URL of the default executor. */
  get baseUrl(): string {
    return this.#config.baseUrl;
  }

  /**
   * Handle for a configured resource. Handles are cheap; every one shares the
   * client's executor and the action table resolved at {@link ApiClient.create}.
   */
  resource<Name extends keyof Resources & string>(name: Name): ResourceHandle<Resources[Name]['actions']> {
    // A name outside the table (untyped callers) gets a handle refusing every action.
    const { endpoint, actions } = this.#resolved.get(name) ?? { endpoint: name, actions: new Map<string, never>() };
    return new ResourceHandle<Resources[Name]['actions']>(endpoint, actions, this.#executor);
  }
}
