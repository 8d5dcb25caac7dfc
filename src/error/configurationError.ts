import { ApiError } from './apiError.js';
import { isErrorType } from './unwrapErrorType.js';

/** Context for a {@link ConfigurationError}. */
export interface ConfigurationErrorDetails {
  /** Action that was not allowed or misconfigured. */
  action?: string | null;
  /** Endpoint of the resource involved. */
  endpoint?: string | null;
}

/**
 * Error raised for disallowed or misconfigured actions and invalid client
 * configuration. Always produced before any request is sent.
 */
export class ConfigurationError extends ApiError {
  /** ConfigurationError error-name */
  static name = 'ConfigurationError';

  #action: string | null;
  #endpoint: string | null;

  /** Creates a new instance of a ConfigurationError */
  constructor(message: string, details: ConfigurationErrorDetails = {}, opts?: ErrorOptions) {
    super(message, 'configuration', {}, opts);
    this.#action = details.action ?? null;
    this.#endpoint = details.endpoint ?? null;
  }

  get action(): string | null {
    return this.#action;
  }

  get endpoint(): string | null {
    return this.#endpoint;
  }
}

/**
 * Checks whether an error is, or wraps, a {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): boolean {
  return isErrorType(ConfigurationError, error);
}
