import { describe, expect, it } from 'vitest';
import { getValidationError, isValidationError, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('lists every issue with its path', () => {
    const err = new ValidationError('error validating data', [
      { message: 'Required', path: ['name'] },
      { message: 'Expected string', path: ['customer', { key: 'dv' }] },
      { message: 'Expected object' },
    ]);

    expect(err.message).toBe(
      'error validating data; name: Required; customer.dv: Expected string; <root>: Expected object',
    );
    expect(err.issues).toHaveLength(3);
  });

  it('keeps the bare message without issues', () => {
    expect(new ValidationError('error validating on validation start', []).message).toBe(
      'error validating on validation start',
    );
  });

  it('hands out a copy of its issues', () => {
    const err = new ValidationError('error validating data', [{ message: 'Required', path: ['id'] }]);
    err.issues.pop();

    expect(err.issues).toHaveLength(1);
  });
});

describe('isValidationError', () => {
  it('returns true for a wrapped ValidationError', () => {
    const err = new Error('outer', { cause: new ValidationError('error validating data', []) });

    expect(isValidationError(err)).toBe(true);
  });

  it('returns false for plain errors', () => {
    expect(isValidationError(new Error('error'))).toBe(false);
  });
});

describe('getValidationError', () => {
  it('unwraps nested causes', () => {
    const validationErr = new ValidationError('error validating data', []);
    const err = new Error('error', { cause: validationErr });

    expect(getValidationError(err)).toBe(validationErr);
  });
});
