import type { OptionFunc } from './request.js';

/** Value types accepted for query parameters. */
export type QueryValue = string | number | boolean;

/** Sets a header; invalid names or values fail the build. */
export function withHeader(name: string, value: string): OptionFunc {
  return (request) => {
    request.headers.set(name, value);
  };
}

/** Sets the `Content-Type` header. */
export function withContentType(contentType: string): OptionFunc {
  return withHeader('Content-Type', contentType);
}

/**
 * Appends query parameters. `undefined` entries are skipped, arrays repeat the key.
 * Only meaningful for GET and DELETE, since a body clears the query.
 */
export function withQuery(params: Record<string, QueryValue | QueryValue[] | undefined>): OptionFunc {
  return (request) => {
    for (const [key, value] of Object.entries(params)) {
      if (!key) {
        return new Error('error empty query parameter name');
      }

      if (value === undefined) {
        continue;
      }

      for (const item of Array.isArray(value) ? value : [value]) {
        request.query.append(key, String(item));
      }
    }

    return null;
  };
}
