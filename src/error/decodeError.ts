import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a successful response body cannot be read, parsed or
 * validated into the requested destination.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  static name = 'DecodeError';
  name = DecodeError.name;
  /** Schema validation issues, empty when reading or parsing failed */
  issues: StandardSchemaV1.Issue[];

  /** Creates a new instance of the DecodeError, with accompanying Issues */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[] = [], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}; issues: ${JSON.stringify(issues)}` : message, opts);
    this.issues = [...issues];
  }
}

/**
 * Type guard for {@link DecodeError}, matching it anywhere in the cause chain.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}
