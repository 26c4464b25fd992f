import { describe, it, expect } from 'vitest';
import {
  BreakerOpenError,
  ReasonerError,
  StorageError,
  TransientStorageError,
  ValidationError,
  toError,
} from '../../../src/core/errors.js';

describe('errors', () => {
  it('should carry codes through the hierarchy', () => {
    const error = new TransientStorageError('timeout', 'getEntity');
    expect(error).toBeInstanceOf(StorageError);
    expect(error).toBeInstanceOf(ReasonerError);
    expect(error.code).toBe('STORAGE_TRANSIENT');
    expect(error.name).toBe('TransientStorageError');
  });

  it('should describe how long an open breaker stays shut', () => {
    expect(new BreakerOpenError('storage', 1500).message)
      .toBe('Circuit breaker "storage" is OPEN. Retry in 2s.');
    expect(new BreakerOpenError('storage', 0).message)
      .toBe('Circuit breaker "storage" is probing recovery; call rejected.');
  });

  it('should keep validation issues', () => {
    expect(new ValidationError('bad', ['a: x', 'b: y']).issues).toEqual(['a: x', 'b: y']);
  });

  it('should normalize thrown values', () => {
    const original = new Error('x');
    expect(toError(original)).toBe(original);
    expect(toError('plain').message).toBe('plain');
  });
});
