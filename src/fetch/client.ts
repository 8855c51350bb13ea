import type { PendingRequest } from '../core/request.js';
import type { FetchResponse } from '../types/request.js';
import type { HttpTransport } from '../types/transport.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Fetch-compatible function, e.g. the global `fetch` or an in-process app's handler. */
export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /**
   * Function used to send requests.
   * @default the global `fetch`, looked up on every call
   */
  fetch?: FetchFunction;
}

/**
 * Thin wrapper around the `fetch` API that:
 * - sends a {@link PendingRequest} exactly as built (URL, method, headers, body),
 * - returns error-first tuples via {@link SafeWrapAsync},
 * - treats any received response as success, whatever its status.
 */
export class FetchTransport implements HttpTransport {
  /** Injected fetch function, if any. */
  #fetch?: FetchFunction;

  /** Creates a new transport, optionally bound to a specific fetch function */
  constructor(opts?: FetchTransportOptions) {
    this.#fetch = opts?.fetch;
  }

  /**
   * Sends the request.
   *
   * Errors:
   * - Network, DNS and TLS failures are returned as thrown by fetch, unwrapped.
   * - Non-2xx responses are NOT errors at this level; classification happens later.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  async send(request: PendingRequest): SafeWrapAsync<Error, FetchResponse> {
    const fetchFn: FetchFunction = this.#fetch ?? globalThis.fetch;
    const [err, res] = await safeWrapAsync(() =>
      fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        ...(request.body && { body: request.body }),
      }),
    );

    if (err) {
      return [err, null];
    }

    // Cast this for some more type-safety on http-status-codes
    return [null, res as FetchResponse];
  }
}
