import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

class CustomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CustomError';
  }
}

describe('toError', () => {
  it('passes errors through untouched', () => {
    const err = new CustomError('custom');
    expect(toError(err)).toBe(err);
  });

  it('uses a thrown string as the message', () => {
    const err = toError('plain string');
    expect(err.message).toBe('plain string');
    expect(err.cause).toBe('plain string');
  });

  it('keeps other thrown values as cause', () => {
    const thrown = { code: 42 };
    const err = toError(thrown);
    expect(err.message).toBe('non-error value thrown: [object Object]');
    expect(err.cause).toBe(thrown);
  });
});

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => {
      throw new CustomError('custom boom');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(CustomError);
    expect(err?.message).toBe('custom boom');
  });

  it('captures JSON.parse failures as SyntaxError', () => {
    const [err, data] = safeWrap(() => JSON.parse('{ broken'));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('async boom')));

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('returns [error, null] when the factory throws before returning a promise', async () => {
    const [err, data] = await safeWrapAsync((): Promise<string> => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });

  it('normalizes rejected non-error values', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject('rejected'));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('rejected');
  });
});
