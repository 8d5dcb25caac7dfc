import { describe, expect, it } from 'vitest';
import { HTTPError } from './httpError.js';
import { isResponseKeyError, ResponseKeyError } from './responseKeyError.js';

describe('ResponseKeyError', () => {
  it('names the key, action, endpoint and available keys', () => {
    const err = new ResponseKeyError('missing', {
      action: 'get',
      endpoint: 'company',
      availableKeys: ['company'],
      statusCode: 200,
    });

    expect(err.message).toBe(
      "error response key 'missing' not found in get response for company (available keys: company)",
    );
    expect(err.key).toBe('missing');
    expect(err.action).toBe('get');
    expect(err.endpoint).toBe('company');
    expect(err.availableKeys).toEqual(['company']);
    expect(err.kind).toBe('http');
    expect(err.statusCode).toBe(200);
  });

  it('folds the API diagnostic into the message', () => {
    const err = new ResponseKeyError('invoice', {
      action: 'create',
      endpoint: 'invoices',
      availableKeys: ['message'],
      diagnostic: 'Invalid resolution number',
    });

    expect(err.message).toBe(
      "error response key 'invoice' not found in create response for invoices: Invalid resolution number (available keys: message)",
    );
  });

  it('omits the key list when the body had none', () => {
    const err = new ResponseKeyError('file', { action: 'perform__file_xml', endpoint: 'invoices', availableKeys: [] });

    expect(err.message).toBe("error response key 'file' not found in perform__file_xml response for invoices");
  });
});

describe('isResponseKeyError', () => {
  it('returns true for ResponseKeyError, which is also an HTTPError', () => {
    const err = new ResponseKeyError('file', { action: 'get', endpoint: 'invoices', availableKeys: [] });

    expect(isResponseKeyError(err)).toBe(true);
    expect(err).toBeInstanceOf(HTTPError);
  });

  it('returns false for a plain HTTPError', () => {
    expect(isResponseKeyError(new HTTPError('boom', 'http'))).toBe(false);
  });
});
