import { ApiError } from '../error/apiError.js';
import { ConfigurationError } from '../error/configurationError.js';
import { HTTPError } from '../error/httpError.js';
import { ResponseParseError } from '../error/responseParseError.js';
import type { CallOptions, ExecutorRequest, RawResponse, RequestExecutor } from '../types/request.js';
import { joinPath, type QueryParams } from '../utils/constructUrl.js';
import { getResponseData } from '../utils/getResponseData.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { classifyResponse, classifyTransportError } from './classify.js';
import { preparePayload } from './payload.js';
import {
  type ActionInput,
  type ActionOutput,
  type ResolvedAction,
  type ResourceActions,
  SUBACTION_PREFIX,
  type SchemaOutput,
  type SubactionKey,
} from './types.js';
import { stringify, type UnwrapContext, unwrap, unwrapAndValidate, validateCandidate } from './unwrap.js';

/** Resolved action of one variant. */
type ActionOf<Type extends ResolvedAction['type']> = Extract<ResolvedAction, { type: Type }>;

/** Everything an operation contributes to a request besides the verb. */
type RequestParts = Pick<ExecutorRequest, 'path' | 'body' | 'query'>;

/** Narrows a looked-up action to the variant an operation expects. */
function isResolved<Type extends ResolvedAction['type']>(
  action: ResolvedAction | undefined,
  type: Type,
): action is ActionOf<Type> {
  return action?.type === type;
}

/** Encodes an id as a single path segment. */
function encodeId(id: string | number): string {
  return encodeURIComponent(String(id));
}

/**
 * Typed client for one REST resource.
 *
 * Every operation runs the same skeleton: check the action is configured,
 * build the request, send it through the injected {@link RequestExecutor}, then
 * classify a failure or unwrap and validate the body. Nothing throws; results
 * are error-first tuples via {@link SafeWrapAsync}.
 *
 * The handle holds no per-call state, so concurrent calls never interact.
 *
 * @typeParam Actions - The action table the handle was built from.
 */
export class ResourceHandle<Actions extends ResourceActions = ResourceActions> {
  /** Endpoint path, without leading or trailing slash. */
  #endpoint: string;
  /** Actions resolved at construction. */
  #actions: ReadonlyMap<string, ResolvedAction>;
  /** Executor borrowed from the owning client. */
  #executor: RequestExecutor;

  /**
   * Prefer {@link createResource}, which resolves and checks the action table.
   */
  constructor(endpoint: string, actions: ReadonlyMap<string, ResolvedAction>, executor: RequestExecutor) {
    this.#endpoint = endpoint;
    this.#actions = actions;
    this.#executor = executor;
  }

  get endpoint(): string {
    return this.#endpoint;
  }

  /** Whether an action key (e.g. `get`, `perform__cancel`) is configured. */
  allows(action: string): boolean {
    return this.#actions.has(action);
  }

  /**
   * Fetches one entity: `GET endpoint/id`.
   */
  get(id: string | number, opts: CallOptions = {}): SafeWrapAsync<ApiError, ActionOutput<Actions, 'get'>> {
    return this.#dispatch(
      'get',
      "action 'get'",
      'entity',
      opts,
      () => [null, { path: joinPath(this.#endpoint, encodeId(id)) }],
      (action, response) => this.#entity(action, response),
    );
  }

  /**
   * Creates an entity: `POST endpoint` with the prepared payload.
   */
  create(
    payload: ActionInput<Actions, 'create'>,
    opts: CallOptions = {},
  ): SafeWrapAsync<ApiError, ActionOutput<Actions, 'create'>> {
    return this.#dispatch(
      'create',
      "action 'create'",
      'entity',
      opts,
      (action) => this.#withBody(action, this.#endpoint, payload),
      (action, response) => this.#entity(action, response),
    );
  }

  /**
   * Updates an entity: `PATCH endpoint/id` with the prepared payload.
   */
  update(
    id: string | number,
    payload: ActionInput<Actions, 'update'>,
    opts: CallOptions = {},
  ): SafeWrapAsync<ApiError, ActionOutput<Actions, 'update'>> {
    return this.#dispatch(
      'update',
      "action 'update'",
      'entity',
      opts,
      (action) => this.#withBody(action, joinPath(this.#endpoint, encodeId(id)), payload),
      (action, response) => this.#entity(action, response),
    );
  }

  /**
   * Deletes an entity: `DELETE endpoint/id`.
   *
   * Resolves to `true` for status 200 and 204. Any other status below 400 is
   * returned as an `http` kind {@link HTTPError}.
   */
  delete(id: string | number, opts: CallOptions = {}): SafeWrapAsync<ApiError, boolean> {
    return this.#dispatch(
      'delete',
      "action 'delete'",
      'delete',
      opts,
      () => [null, { path: joinPath(this.#endpoint, encodeId(id)) }],
      (_action, response): SafeWrap<ApiError, boolean> => {
        if (response.status === 200 || response.status === 204) {
          return [null, true];
        }

        return [
          new HTTPError(
            `HTTP ${response.status} error for ${response.url}: unexpected status for delete`,
            'http',
            { statusCode: response.status, rawBody: response.body, url: response.url },
          ),
          null,
        ];
      },
    );
  }

  /**
   * Lists entities: `GET endpoint` with the query passed verbatim.
   *
   * The unwrapped value must be an array; each element is validated on its own
   * and the order of the response is kept.
   */
  list(query?: QueryParams, opts: CallOptions = {}): SafeWrapAsync<ApiError, ActionOutput<Actions, 'list'>[]> {
    return this.#dispatch(
      'list',
      "action 'list'",
      'collection',
      opts,
      () => [null, { path: this.#endpoint, ...(query && { query }) }],
      (action, response) => this.#collection(action, response),
    );
  }

  /**
   * Runs a subaction: `endpoint/id/<suffix>`, configured under `perform__<subaction>`.
   *
   * `replace` and `cancel` are sent as POST, anything else as GET, unless the
   * definition names a verb. Without a payload no body is sent at all.
   */
  performSubaction<Name extends string>(
    id: string | number,
    subaction: Name,
    payload?: ActionInput<Actions, SubactionKey<Name>>,
    opts: CallOptions = {},
  ): SafeWrapAsync<ApiError, ActionOutput<Actions, SubactionKey<Name>>> {
    return this.#dispatch(
      `${SUBACTION_PREFIX}${subaction}`,
      `subaction '${subaction}'`,
      'entity',
      opts,
      (action) => {
        const path = joinPath(this.#endpoint, encodeId(id), action.suffix ?? subaction);
        if (payload === undefined || payload === null) {
          return [null, { path }];
        }

        return this.#withBody(action, path, payload);
      },
      (action, response) => this.#entity(action, response),
    );
  }

  /**
   * Shared dispatch skeleton.
   *
   * - Fails with a {@link ConfigurationError} before sending anything when the action is not configured.
   * - Wraps executor failures as transport errors.
   * - Classifies status >= 400 before the body is looked at.
   * - Hands successful responses to `interpret`.
   */
  async #dispatch<Type extends ResolvedAction['type'], Result>(
    name: string,
    label: string,
    type: Type,
    opts: CallOptions,
    build: (action: ActionOf<Type>) => SafeWrap<ApiError, RequestParts>,
    interpret: (action: ActionOf<Type>, response: RawResponse) => SafeWrap<ApiError, Result>,
  ): SafeWrapAsync<ApiError, Result> {
    const action = this.#actions.get(name);
    if (!isResolved(action, type)) {
      return [
        new ConfigurationError(`The ${label} is not allowed for ${this.#endpoint}`, {
          action: name,
          endpoint: this.#endpoint,
        }),
        null,
      ];
    }

    const [errBuild, parts] = build(action);
    if (errBuild) {
      return [errBuild, null];
    }

    const resolved: ResolvedAction = action;
    const request: ExecutorRequest = {
      method: resolved.method,
      ...parts,
      ...(opts.signal && { signal: opts.signal }),
    };

    const [errExecute, wrapped] = await safeWrapAsync(() => this.#executor.execute(request));
    if (errExecute) {
      return [classifyTransportError(errExecute, request.path), null];
    }

    const [errTransport, response] = wrapped;
    if (errTransport) {
      return [classifyTransportError(errTransport, request.path), null];
    }

    if (response.status >= 400) {
      return [classifyResponse(response.status, response.body, response.url), null];
    }

    return interpret(action, response);
  }

  /**
   * Validates the payload against the action's request schema, if any, and
   * prepares it for the wire. A rejected payload is a `validation` kind
   * {@link ApiError} without status, wrapping the `ValidationError`.
   */
  #withBody(action: ActionOf<'entity'>, path: string, payload: unknown): SafeWrap<ApiError, RequestParts> {
    if (action.request === null) {
      return [null, { path, body: preparePayload(payload) }];
    }

    const [errValidate, validated] = validator(payload, action.request);
    if (errValidate) {
      return [
        new ApiError(
          `The ${action.name} payload for ${this.#endpoint} does not match its request shape`,
          'validation',
          { statusCode: null },
          { cause: errValidate },
        ),
        null,
      ];
    }

    return [null, { path, body: preparePayload(validated) }];
  }

  /** Context for errors raised while reading a response. */
  #context(action: ResolvedAction, response: RawResponse): UnwrapContext {
    return { action: action.name, endpoint: this.#endpoint, statusCode: response.status, url: response.url };
  }

  /** Parses, unwraps and validates a single-entity response. */
  #entity(action: ActionOf<'entity'>, response: RawResponse): SafeWrap<ApiError, SchemaOutput> {
    const [errBody, body] = getResponseData(response);
    if (errBody) {
      return [errBody, null];
    }

    return unwrapAndValidate(body, action, this.#context(action, response));
  }

  /** Parses and unwraps a collection response, validating each element in order. */
  #collection(action: ActionOf<'collection'>, response: RawResponse): SafeWrap<ApiError, SchemaOutput[]> {
    const context = this.#context(action, response);
    const [errBody, body] = getResponseData(response);
    if (errBody) {
      return [errBody, null];
    }

    const [errUnwrap, candidate] = unwrap(body, action, context);
    if (errUnwrap) {
      return [errUnwrap, null];
    }

    if (!Array.isArray(candidate)) {
      return [
        new ResponseParseError(`list response for ${this.#endpoint} is not an array`, {
          statusCode: response.status,
          rawBody: stringify(candidate),
          url: response.url,
        }),
        null,
      ];
    }

    const items: SchemaOutput[] = [];
    for (const [index, item] of candidate.entries()) {
      const [errItem, validated] = validateCandidate(item, action.response, `list[${index}]`, context);
      if (errItem) {
        return [errItem, null];
      }

      items.push(validated);
    }

    return [null, items];
  }
}
