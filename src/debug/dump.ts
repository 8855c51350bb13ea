import type { PendingRequest } from '../core/request.js';
import type { FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

const CRLF = '\r\n';
const decoder = new TextDecoder();

/** Marker prefix for every framed dump. */
export const DUMP_TAG = '[careplane]';

function headerLines(headers: Headers): string[] {
  const lines: string[] = [];
  for (const [name, value] of headers) {
    lines.push(`${name}: ${value}`);
  }

  return lines;
}

/**
 * Renders a request the way it goes over the wire: request line, `Host`,
 * headers, then the body.
 */
export function dumpRequest(request: PendingRequest): string {
  const lines = [`${request.method} ${request.requestUri} HTTP/1.1`, `host: ${request.host}`, ...headerLines(request.headers)];
  if (request.body) {
    lines.push(`content-length: ${request.contentLength}`);
  }

  const body = request.body ? decoder.decode(request.body) : '';
  return `${lines.join(CRLF)}${CRLF}${CRLF}${body}`;
}

/**
 * Renders a response: status line, headers, then the body. Reads a clone, so
 * the original body is left for the destination.
 */
export async function dumpResponse(response: FetchResponse): SafeWrapAsync<Error, string> {
  const [errBody, body] = await safeWrapAsync(() => response.clone().text());
  if (errBody) {
    return [new Error('error reading response body for dump', { cause: errBody }), null];
  }

  const lines = [`HTTP/1.1 ${response.status} ${response.statusText}`.trimEnd(), ...headerLines(response.headers)];
  return [null, `${lines.join(CRLF)}${CRLF}${CRLF}${body}`];
}

/** Wraps a dump in start/end markers, e.g. `[careplane] --- Request start ---`. */
export function frame(kind: 'Request' | 'Response', dump: string): string {
  return `${DUMP_TAG} --- ${kind} start ---\n${dump}\n${DUMP_TAG} --- ${kind} end ---\n`;
}
