/**
 * Error entrypoint: exports the typed transport errors and helpers for identifying and unwrapping them.
 * @module
 */

/** Error raised when a client cannot be configured. */
/** Type guard that checks if an error is a {@link ConfigurationError}. */
/** Extract a {@link ConfigurationError} from an unknown error value, following nested causes. */
export {
  ConfigurationError,
  type ConfigurationIssue,
  getConfigurationError,
  isConfigurationError,
} from './configurationError.js';

/** Error raised when a successful response body cannot be decoded. */
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';

/** Error representing a GraphQL response carrying an `errors` array. */
export { GraphQLError, type GraphQLErrorEntry, isGraphQLError } from './graphqlError.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';

/** Error representing a status outside the success set. */
export { getNonSuccessStatusError, isNonSuccessStatusError, NonSuccessStatusError } from './nonSuccessStatusError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
