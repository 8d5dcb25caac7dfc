import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../error/configurationError.js';
import { ENVIRONMENT_URLS, resolveConfig } from './config.js';

describe('resolveConfig', () => {
  it('defaults to the sandbox and a 30s deadline', () => {
    const [err, config] = resolveConfig({ apiKey: ' test-key ' });

    expect(err).toBeNull();
    expect(config).toEqual({
      apiKey: 'test-key',
      environment: 'sandbox',
      baseUrl: 'https://sandbox-api.alegra.com/e-provider/col/v1',
      timeout: 30_000,
    });
  });

  it('uses the production base URL', () => {
    const [, config] = resolveConfig({ apiKey: 'test-key', environment: 'production' });

    expect(config?.baseUrl).toBe(ENVIRONMENT_URLS.production);
  });

  it('lets an explicit base URL win', () => {
    const [, config] = resolveConfig({ apiKey: 'test-key', environment: 'production', baseUrl: 'http://localhost:8080/v1' });

    expect(config?.environment).toBe('production');
    expect(config?.baseUrl).toBe('http://localhost:8080/v1');
  });

  it('accepts a disabled deadline', () => {
    const [, config] = resolveConfig({ apiKey: 'test-key', timeout: false });

    expect(config?.timeout).toBe(false);
  });

  it('rejects an empty API key', () => {
    const [err, config] = resolveConfig({ apiKey: '   ' });

    expect(config).toBeNull();
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err?.message).toBe('API key cannot be empty');
  });

  it('rejects an unknown environment', () => {
    const [err] = resolveConfig({ apiKey: 'test-key', environment: 'staging' });

    expect(err?.message).toBe("Invalid environment 'staging'. Must be one of: sandbox, production");
    expect(err?.kind).toBe('configuration');
  });

  it.each([0, -5, Number.NaN])('rejects the timeout %s', (timeout) => {
    const [err] = resolveConfig({ apiKey: 'test-key', timeout });

    expect(err?.message).toBe(`Invalid timeout '${timeout}'. Must be a positive number of milliseconds or false`);
  });
});
