import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { getApiError } from '../error/apiError.js';
import { ConfigurationError } from '../error/configurationError.js';
import type { RequestExecutor } from '../types/request.js';
import { ApiClient, type ApiClientProps } from './client.js';

const Company = z.object({ id: z.string(), name: z.string() });
const Invoice = z.object({ id: z.string(), number: z.string() });

const resources = {
  company: {
    endpoint: 'company',
    actions: {
      get: { response: Company, responseKey: 'company' },
      update: { response: Company, responseKey: 'company' },
    },
  },
  invoices: {
    endpoint: '/invoices/',
    actions: {
      get: { response: Invoice, responseKey: 'invoice' },
      delete: {},
      perform__file_xml: { response: null, responseKey: 'file', endpointSuffix: 'files/XML' },
    },
  },
};

/** Client over the shared resource table, failing the test on invalid settings. */
function createClient(props: Omit<ApiClientProps<typeof resources>, 'resources'>): ApiClient<typeof resources> {
  const [err, client] = ApiClient.create({ ...props, resources });
  if (err) {
    throw err;
  }

  return client;
}

describe('ApiClient', () => {
  describe('create', () => {
    it('resolves connection defaults', () => {
      const [err, client] = ApiClient.create({ apiKey: 'test-key', resources });

      expect(err).toBeNull();
      expect(client?.environment).toBe('sandbox');
      expect(client?.baseUrl).toBe('https://sandbox-api.alegra.com/e-provider/col/v1');
    });

    it('returns the configuration error of invalid settings', () => {
      const [err, client] = ApiClient.create({ apiKey: '', resources });

      expect(client).toBeNull();
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err?.message).toBe('API key cannot be empty');
    });

    it('returns the first malformed resource', () => {
      const [err] = ApiClient.create({
        apiKey: 'test-key',
        resources: {
          company: { endpoint: 'company', actions: { get: { response: Company } } },
          broken: { endpoint: '/', actions: {} },
        },
      });

      expect(err?.message).toBe('Resource endpoint cannot be empty');
    });
  });

  describe('resource', () => {
    it('shares the injected executor across handles', async () => {
      const execute = vi.fn<RequestExecutor['execute']>();
      execute
        .mockResolvedValueOnce([null, { status: 200, url: 'company/1', body: '{"company":{"id":"1","name":"Acme"}}' }])
        .mockResolvedValueOnce([null, { status: 204, url: 'invoices/9', body: null }]);
      const client = createClient({ apiKey: 'test-key', executor: { execute } });

      const [errCompany, company] = await client.resource('company').get('1');
      const [errDelete, deleted] = await client.resource('invoices').delete('9');

      expect(errCompany).toBeNull();
      expect(company).toEqual({ id: '1', name: 'Acme' });
      expect(errDelete).toBeNull();
      expect(deleted).toBe(true);
      expect(client.resource('invoices').endpoint).toBe('invoices');
      expect(execute.mock.calls.map(([request]) => `${request.method} ${request.path}`)).toEqual([
        'GET company/1',
        'DELETE invoices/9',
      ]);
    });

    it('keeps actions the resource does not declare out of reach', async () => {
      const execute = vi.fn<RequestExecutor['execute']>();
      const client = createClient({ apiKey: 'test-key', executor: { execute } });

      const [err] = await client.resource('company').delete('1');

      expect(getApiError(err)?.kind).toBe('configuration');
      expect(err?.message).toBe("The action 'delete' is not allowed for company");
      expect(execute).not.toHaveBeenCalled();
    });
  });

  describe('default executor', () => {
    const fetchMock = vi.fn<typeof fetch>();

    beforeEach(() => {
      fetchMock.mockReset();
      vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it('sends requests to the environment base URL with the bearer credential', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{"file":{"name":"FE-1.xml"}}', { status: 200 }));
      const client = createClient({ apiKey: 'test-key', environment: 'production' });

      const [err, file] = await client.resource('invoices').performSubaction('42', 'file_xml');

      expect(err).toBeNull();
      expect(file).toEqual({ name: 'FE-1.xml' });
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.alegra.com/e-provider/col/v1/invoices/42/files/XML');

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.method).toBe('GET');
      expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-key');
    });

    it('sends extra headers and honours a base URL override', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{"company":{"id":"1","name":"Acme"}}', { status: 200 }));
      const client = createClient({
        apiKey: 'test-key',
        baseUrl: 'http://localhost:8080/v1',
        headers: { 'X-Request-Source': 'tests' },
      });

      await client.resource('company').update('1', { name: 'Acme', email: null });

      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:8080/v1/company/1');
      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.body).toBe('{"name":"Acme"}');
      expect(new Headers(init?.headers).get('x-request-source')).toBe('tests');
    });

    it('classifies error statuses from the wire', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('{"message":"Invalid token"}', { status: 401, headers: { 'Content-Type': 'application/json' } }),
      );
      const client = createClient({ apiKey: 'test-key' });

      const [err] = await client.resource('company').get('1');
      const apiError = getApiError(err);

      expect(apiError?.kind).toBe('authentication');
      expect(apiError?.statusCode).toBe(401);
      expect(apiError?.url).toBe('https://sandbox-api.alegra.com/e-provider/col/v1/company/1');
      expect(err?.message).toBe(
        'HTTP 401 error for https://sandbox-api.alegra.com/e-provider/col/v1/company/1: Authentication failed. Please check your API key. - API message: Invalid token',
      );
    });
  });
});
