import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

describe('validator', () => {
  it('correct schema validates to correct', () => {
    const data = { id: '1', name: 'Acme' };
    const schema = z.object({ id: z.string(), name: z.string() });
    const [err, parsed] = validator(data, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual(data);
  });

  it('returns the transformed output', () => {
    const schema = z.object({ amount: z.string().transform(Number) });
    const [err, parsed] = validator({ amount: '12.5' }, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual({ amount: 12.5 });
  });

  it('returns the issues of an invalid value', () => {
    const schema = z.object({ id: z.string(), name: z.string() });
    const [err, value] = validator({ id: 1, name: 'Acme' }, schema);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.issues).toHaveLength(1);
    expect(err?.issues[0]?.path).toEqual(['id']);
    expect(err?.message.startsWith('error validating data; id: ')).toBe(true);
  });

  it('returns error when validation throws', () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: () => {
          throw new Error('oops');
        },
      },
    };

    const [err, value] = validator({}, schema);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error validating on validation start');
    expect(err?.cause).toBeInstanceOf(Error);
  });

  it('rejects schemas that validate asynchronously', () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: (value) => Promise.resolve({ value: String(value) }),
      },
    };

    const [err, value] = validator('x', schema);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error async schema validation is not supported');
  });
});
