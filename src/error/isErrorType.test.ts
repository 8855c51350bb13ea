import { describe, expect, it } from 'vitest';
import { ConfigurationError, isConfigurationError } from './configurationError.js';
import { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
import { GraphQLError, isGraphQLError } from './graphqlError.js';
import { isErrorType } from './isErrorType.js';
import { getNonSuccessStatusError, isNonSuccessStatusError, NonSuccessStatusError } from './nonSuccessStatusError.js';

describe('isErrorType', () => {
  it('matches a wrapped error class', () => {
    const err = new Error('outer', { cause: new NonSuccessStatusError(500) });
    expect(isErrorType(NonSuccessStatusError, err)).toBe(true);
    expect(isErrorType(DecodeError, err)).toBe(false);
  });

  it('narrows an unknown error to the matched class', () => {
    const err: unknown = new NonSuccessStatusError(429);
    if (!isNonSuccessStatusError(err)) {
      throw new Error('expected a NonSuccessStatusError');
    }
    expect(err.status).toBe(429);
  });

  it('narrows through the generic helper', () => {
    const err: unknown = new ConfigurationError('bad config', [{ path: 'baseUrl', message: 'Required' }]);
    if (!isErrorType(ConfigurationError, err)) {
      throw new Error('expected a ConfigurationError');
    }
    expect(err.issues).toEqual([{ path: 'baseUrl', message: 'Required' }]);
  });
});

describe('ConfigurationError', () => {
  it('exposes issues via getter', () => {
    const err = new ConfigurationError('bad config', [{ path: 'rootOrgId', message: 'Required' }]);
    expect(err.issues).toEqual([{ path: 'rootOrgId', message: 'Required' }]);
    expect(err.name).toBe('ConfigurationError');
    expect(isConfigurationError(err)).toBe(true);
  });

  it('defaults to no issues', () => {
    expect(new ConfigurationError('empty url').issues).toEqual([]);
  });
});

describe('NonSuccessStatusError', () => {
  it('exposes status and a default message', () => {
    const err = new NonSuccessStatusError(404);
    expect(err.status).toBe(404);
    expect(err.message).toBe('error non-success status 404');
    expect(err.name).toBe('NonSuccessStatusError');
  });

  it('is found through causes', () => {
    const err = new NonSuccessStatusError(503);
    const wrapped = new Error('outer', { cause: err });
    expect(isNonSuccessStatusError(wrapped)).toBe(true);
    expect(getNonSuccessStatusError(wrapped)).toBe(err);
    expect(getNonSuccessStatusError(new Error('plain'))).toBeNull();
  });
});

describe('DecodeError', () => {
  it('appends issues to the message when present', () => {
    const err = new DecodeError('error validating data', [{ message: 'Required', path: ['id'] }]);
    expect(err.message).toBe('error validating data; issues: [{"message":"Required","path":["id"]}]');
    expect(err.issues).toHaveLength(1);
  });

  it('keeps the plain message without issues', () => {
    const cause = new SyntaxError('Unexpected token');
    const err = new DecodeError('error parsing json body', [], { cause });
    expect(err.message).toBe('error parsing json body');
    expect(err.cause).toBe(cause);
    expect(isDecodeError(err)).toBe(true);
    expect(getDecodeError(new Error('outer', { cause: err }))).toBe(err);
  });
});

describe('GraphQLError', () => {
  it('joins the reported messages', () => {
    const err = new GraphQLError([{ message: 'not found' }, { message: 'forbidden', path: ['app'] }]);
    expect(err.message).toBe('error graphql: not found; forbidden');
    expect(err.errors).toHaveLength(2);
    expect(isGraphQLError(err)).toBe(true);
  });
});
