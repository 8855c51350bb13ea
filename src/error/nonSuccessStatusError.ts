import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response whose status is outside the success set.
 * The response itself travels next to this error, unread.
 */
export class NonSuccessStatusError extends Error {
  /** NonSuccessStatusError error-name */
  static name = 'NonSuccessStatusError';
  name = NonSuccessStatusError.name;
  /** Status code that failed classification */
  #status: number;

  /** Creates a new instance of a NonSuccessStatusError for the given status */
  constructor(status: number, message = `error non-success status ${status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#status = status;
  }

  /** Status code that failed classification */
  get status(): number {
    return this.#status;
  }
}

/**
 * Type guard for {@link NonSuccessStatusError}, matching it anywhere in the cause chain.
 */
export function isNonSuccessStatusError(error: unknown): error is NonSuccessStatusError {
  return isErrorType(NonSuccessStatusError, error);
}

/**
 * Extract a {@link NonSuccessStatusError} from an unknown error value, following nested causes.
 */
export function getNonSuccessStatusError(error: unknown): null | NonSuccessStatusError {
  return unwrapErrorType(NonSuccessStatusError, error);
}
