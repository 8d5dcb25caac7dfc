import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { HttpMethod } from '../types/request.js';

/** Schema for unknown input, any output, used to easier infer data */
// biome-ignore lint/suspicious/noExplicitAny: This is used for inferrence, and requires any so inference works as it should
export type SchemaType = StandardSchemaV1<unknown, any>;

/** Value produced by validating against a {@link SchemaType}. */
export type SchemaOutput = StandardSchemaV1.InferOutput<SchemaType>;

/** Empty object definition */
export type EmptyObject = Record<never, never>;

/** Prefix marking subaction keys in an action table. */
export const SUBACTION_PREFIX = 'perform__';

/** Subaction key for a given subaction name. */
export type SubactionKey<Name extends string = string> = `${typeof SUBACTION_PREFIX}${Name}`;

/**
 * Action answering with a single entity.
 *
 * `response: null` opts out of validation and hands back the unwrapped value as-is.
 */
export type EntityActionDefinition = {
  response: SchemaType | null;
  /** Body key holding the payload, e.g. `invoice`. */
  responseKey?: string;
};

/** Action sending a payload, optionally validated by `request` before it leaves. */
export type WriteActionDefinition = EntityActionDefinition & {
  request?: SchemaType;
};

/** Collection action; `response` validates each element of the unwrapped array. */
export type ListActionDefinition = EntityActionDefinition;

/** Subaction reached at `endpoint/id/<endpointSuffix ?? name>`. */
export type SubactionDefinition = WriteActionDefinition & {
  /** Path suffix, defaults to the subaction name. May contain `/`. */
  endpointSuffix?: string;
  /** Overrides the verb rule (POST for `replace`/`cancel`, GET otherwise). */
  method?: Extract<HttpMethod, 'GET' | 'POST'>;
};

/**
 * Action table of one resource. An action absent from the table is not allowed
 * for that resource.
 */
export type ResourceActions = {
  get?: EntityActionDefinition;
  create?: WriteActionDefinition;
  update?: WriteActionDefinition;
  delete?: EmptyObject;
  list?: ListActionDefinition;
} & {
  [K in SubactionKey]?: SubactionDefinition;
};

/** One resource: its endpoint path and action table. */
export type ResourceDefinition<Actions extends ResourceActions = ResourceActions> = {
  endpoint: string;
  actions: Actions;
};

/** Named resources served by one client. */
export type ResourceDefinitions = {
  [name: string]: ResourceDefinition;
};

/**
 * Action resolved once at handle construction into a tagged variant, so each
 * call only looks up its name.
 */
export type ResolvedAction =
  | {
      type: 'entity';
      name: string;
      method: HttpMethod;
      /** Path segment after the id, subactions only. */
      suffix: string | null;
      responseKey: string | null;
      response: SchemaType | null;
      request: SchemaType | null;
    }
  | {
      type: 'collection';
      name: 'list';
      method: 'GET';
      responseKey: string | null;
      response: SchemaType | null;
    }
  | {
      type: 'delete';
      name: 'delete';
      method: 'DELETE';
    };

/** Definition configured under `Key`, `never` when absent. */
type DefinitionOf<Actions, Key extends string> = Key extends keyof Actions ? NonNullable<Actions[Key]> : never;

/** Typed result of an action, `unknown` for pass-through actions. */
export type ActionOutput<Actions, Key extends string> = [DefinitionOf<Actions, Key>] extends [never]
  ? unknown
  : [DefinitionOf<Actions, Key>] extends [{ response: infer S extends SchemaType }]
    ? StandardSchemaV1.InferOutput<S>
    : unknown;

/** Typed payload of a write action, falling back to a plain record. */
export type ActionInput<Actions, Key extends string> = [DefinitionOf<Actions, Key>] extends [never]
  ? Record<string, unknown>
  : [DefinitionOf<Actions, Key>] extends [{ request: infer S extends SchemaType }]
    ? StandardSchemaV1.InferInput<S>
    : Record<string, unknown>;
