import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';
import type { ServiceClient } from '../core/client.js';
import { structured } from '../core/destination.js';
import { withContentType } from '../core/options.js';
import type { OptionFunc } from '../core/request.js';
import { DecodeError } from '../error/decodeError.js';
import { GraphQLError } from '../error/graphqlError.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';

const graphqlResponseSchema = z.object({
  data: z.unknown(),
  errors: z
    .array(
      z.object({
        message: z.string(),
        path: z.array(z.union([z.string(), z.number()])).optional(),
      }),
    )
    .optional(),
});

/** Variables sent along with a GraphQL document. */
export type GraphQLVariables = Record<string, unknown>;

/**
 * Minimal GraphQL-over-HTTP client riding on a {@link ServiceClient}: every
 * operation is a JSON POST of `{ query, variables }` to one endpoint path.
 */
export class GraphQLClient {
  #client: ServiceClient;
  /** Endpoint path relative to the base URL. */
  #path: string;

  constructor(client: ServiceClient, path: string) {
    this.#client = client;
    this.#path = path;
  }

  /** Endpoint path relative to the base URL. */
  get path(): string {
    return this.#path;
  }

  /**
   * Runs a query or mutation and validates `data` with `schema`.
   *
   * - Transport, status and body failures come back unchanged.
   * - A response carrying `errors` comes back as a {@link GraphQLError}.
   * - A response without `data`, or with `data` failing `schema`, comes back as a {@link DecodeError}.
   */
  async query<Output>(
    document: string,
    variables: GraphQLVariables,
    schema: StandardSchemaV1<unknown, Output>,
    ...options: OptionFunc[]
  ): SafeWrapAsync<Error, Output> {
    const [errEncode, body] = safeWrap(() => JSON.stringify({ query: document, variables }));
    if (errEncode) {
      return [new Error('error encoding graphql variables', { cause: errEncode }), null];
    }

    const [err, response] = await this.#client.do(
      'POST',
      this.#path,
      body,
      [withContentType('application/json'), ...options],
      structured(graphqlResponseSchema),
    );
    if (err) {
      return [err, null];
    }

    const result = response.data;
    if (result?.errors?.length) {
      return [new GraphQLError(result.errors), null];
    }

    if (result?.data === undefined || result.data === null) {
      return [new DecodeError('error graphql response without data'), null];
    }

    return validator(result.data, schema);
  }
}
