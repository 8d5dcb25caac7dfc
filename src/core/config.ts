import { ConfigurationError } from '../error/configurationError.js';
import type { SafeWrap } from '../utils/wrap.js';

/** Deployment an API key belongs to. */
export type Environment = 'sandbox' | 'production';

/** Base URL per environment. */
export const ENVIRONMENT_URLS: Readonly<Record<Environment, string>> = {
  sandbox: 'https://sandbox-api.alegra.com/e-provider/col/v1',
  production: 'https://api.alegra.com/e-provider/col/v1',
};

/** Connection settings accepted by {@link resolveConfig}. */
export interface ClientConfig {
  /** Bearer credential; surrounding whitespace is trimmed. */
  apiKey: string;
  /**
   * Target environment.
   * @default 'sandbox'
   */
  environment?: Environment | (string & {});
  /** Overrides the environment's base URL, e.g. for a proxy. */
  baseUrl?: string;
  /**
   * Per-call deadline in milliseconds, `false` to disable.
   * @default 30000
   */
  timeout?: number | false;
}

/** Settings after defaults and checks. */
export interface ResolvedConfig {
  apiKey: string;
  environment: Environment;
  baseUrl: string;
  timeout: number | false;
}

function isEnvironment(value: string): value is Environment {
  return Object.hasOwn(ENVIRONMENT_URLS, value);
}

/**
 * Applies defaults and checks connection settings, failing with a
 * {@link ConfigurationError} on the first invalid one.
 */
export function resolveConfig(config: ClientConfig): SafeWrap<ConfigurationError, ResolvedConfig> {
  const apiKey = config.apiKey.trim();
  if (!apiKey) {
    return [new ConfigurationError('API key cannot be empty'), null];
  }

  const environment = config.environment ?? 'sandbox';
  if (!isEnvironment(environment)) {
    return [
      new ConfigurationError(
        `Invalid environment '${environment}'. Must be one of: ${Object.keys(ENVIRONMENT_URLS).join(', ')}`,
      ),
      null,
    ];
  }

  const timeout = config.timeout ?? 30_000;
  if (timeout !== false && (!Number.isFinite(timeout) || timeout <= 0)) {
    return [new ConfigurationError(`Invalid timeout '${timeout}'. Must be a positive number of milliseconds or false`), null];
  }

  const baseUrl = config.baseUrl?.trim() || ENVIRONMENT_URLS[environment];

  return [null, { apiKey, environment, baseUrl, timeout }];
}
