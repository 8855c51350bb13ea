import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DecodeError } from '../error/decodeError.js';
import type { FetchResponse } from '../types/request.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type { ByteSink, Destination } from './destination.js';

/**
 * Copies a body stream to a sink chunk by chunk. The reader is cancelled when
 * the copy stops early and its lock released on every path.
 */
async function copyBody(body: ReadableStream<Uint8Array>, sink: ByteSink): SafeWrapAsync<Error, number> {
  const reader = body.getReader();
  let written = 0;

  try {
    while (true) {
      const [errRead, chunk] = await safeWrapAsync(() => reader.read());
      if (errRead) {
        return [new DecodeError('error reading response body', [], { cause: errRead }), null];
      }

      if (chunk.done) {
        return [null, written];
      }

      const [errWrite] = await safeWrapAsync(async () => {
        await sink.write(chunk.value);
      });
      if (errWrite) {
        await safeWrapAsync(() => reader.cancel(errWrite));
        return [new DecodeError('error writing response body to sink', [], { cause: errWrite }), null];
      }

      written += chunk.value.byteLength;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Parses a body as JSON. Empty bodies decode to `null` without validation,
 * as 204 responses and bodiless 200s carry nothing to validate.
 */
async function decodeBody<T>(response: FetchResponse, schema: StandardSchemaV1<unknown, T>): SafeWrapAsync<DecodeError, T | null> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new DecodeError('error reading response body', [], { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return [new DecodeError('error parsing json response body', [], { cause: errJson }), null];
  }

  return validator(json, schema);
}

/**
 * Delivers a successful response body to its destination.
 *
 * - `none`: the body is cancelled so the connection can be reused.
 * - `raw`: the body is streamed verbatim to the sink.
 * - `structured`: the body is decoded and validated.
 *
 * @returns `[error, data]`, where `data` is only non-null for structured destinations.
 */
export async function deliver<T>(response: FetchResponse, destination: Destination<T>): SafeWrapAsync<Error, T | null> {
  switch (destination.kind) {
    case 'none': {
      const body = response.body;
      if (!body) {
        return [null, null];
      }

      const [errCancel] = await safeWrapAsync(() => body.cancel());
      if (errCancel) {
        return [new DecodeError('error discarding response body', [], { cause: errCancel }), null];
      }

      return [null, null];
    }

    case 'raw': {
      if (!response.body) {
        return [null, null];
      }

      const [errCopy] = await copyBody(response.body, destination.sink);
      if (errCopy) {
        return [errCopy, null];
      }

      return [null, null];
    }

    case 'structured': {
      const [errDecode, data] = await decodeBody(response, destination.schema);
      if (errDecode) {
        return [errDecode, null];
      }

      return [null, data];
    }
  }
}
