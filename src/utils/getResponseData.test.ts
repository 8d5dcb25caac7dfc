import { describe, expect, it } from 'vitest';
import { ResponseParseError } from '../error/responseParseError.js';
import type { RawResponse } from '../types/request.js';
import { getResponseData } from './getResponseData.js';

const url = 'https://api.example.com/v1/companies/1';

function response(status: number, body: string | null): RawResponse {
  return { status, url, body };
}

describe('getResponseData', () => {
  it('parses a JSON body', () => {
    const [err, data] = getResponseData(response(200, '{"company":{"id":"1"}}'));

    expect(err).toBeNull();
    expect(data).toEqual({ company: { id: '1' } });
  });

  it('returns null for 204 and 205 whatever the body', () => {
    expect(getResponseData(response(204, 'ignored'))).toEqual([null, null]);
    expect(getResponseData(response(205, null))).toEqual([null, null]);
  });

  it('returns null for an empty body', () => {
    expect(getResponseData(response(200, null))).toEqual([null, null]);
  });

  it('keeps the raw text and parser error for malformed JSON', () => {
    const [err, data] = getResponseData(response(200, '<html>oops</html>'));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(ResponseParseError);
    expect(err?.kind).toBe('response_parse');
    expect(err?.rawBody).toBe('<html>oops</html>');
    expect(err?.statusCode).toBe(200);
    expect(err?.url).toBe(url);
    expect(err?.cause).toBeInstanceOf(SyntaxError);
  });
});
