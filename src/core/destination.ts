import type { StandardSchemaV1 } from '@standard-schema/spec';

/** Anything bytes can be written to, e.g. a Node `Writable`. Promise results are awaited. */
export interface ByteSink {
  write(chunk: Uint8Array): unknown;
}

/** Response body is not read; on success it is discarded to free the connection. */
export interface NoDestination {
  kind: 'none';
}

/** Response body is copied verbatim to `sink`. */
export interface RawDestination {
  kind: 'raw';
  sink: ByteSink;
}

/** Response body is parsed as JSON and validated with `schema`. */
export interface StructuredDestination<T> {
  kind: 'structured';
  schema: StandardSchemaV1<unknown, T>;
}

/**
 * Where a successful response body goes. Exactly one branch runs per response.
 */
export type Destination<T = unknown> = NoDestination | RawDestination | StructuredDestination<T>;

/** Accepts any JSON value unchanged. */
const passthrough: StandardSchemaV1<unknown, unknown> = {
  '~standard': {
    version: 1,
    vendor: 'careplane',
    validate: (value) => ({ value }),
  },
};

/** Leave the body alone. */
export function discard(): NoDestination {
  return { kind: 'none' };
}

/** Stream the body to a sink. */
export function toSink(sink: ByteSink): RawDestination {
  return { kind: 'raw', sink };
}

/** Decode the body as JSON, validated by `schema` when given. */
export function structured(): StructuredDestination<unknown>;
export function structured<S extends StandardSchemaV1>(schema: S): StructuredDestination<StandardSchemaV1.InferOutput<S>>;
export function structured(schema: StandardSchemaV1 = passthrough): StructuredDestination<unknown> {
  return { kind: 'structured', schema };
}
