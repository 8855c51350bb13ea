import { isErrorType } from './isErrorType.js';

/** Error entry as returned in a GraphQL `errors` array. */
export interface GraphQLErrorEntry {
  message: string;
  path?: (string | number)[];
}

/**
 * Error representing a GraphQL response that carried an `errors` array.
 */
export class GraphQLError extends Error {
  /** GraphQLError error-name */
  static name = 'GraphQLError';
  name = GraphQLError.name;
  /** Errors reported by the server */
  #errors: GraphQLErrorEntry[];

  /** Creates a new instance of a GraphQLError from the reported entries */
  constructor(errors: GraphQLErrorEntry[], opts?: ErrorOptions) {
    super(`error graphql: ${errors.map((entry) => entry.message).join('; ')}`, opts);
    this.#errors = errors;
  }

  /** Errors reported by the server */
  get errors(): GraphQLErrorEntry[] {
    return [...this.#errors];
  }
}

/**
 * Type guard for {@link GraphQLError}, matching it anywhere in the cause chain.
 */
export function isGraphQLError(error: unknown): error is GraphQLError {
  return isErrorType(GraphQLError, error);
}
