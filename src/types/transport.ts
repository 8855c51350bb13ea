import type { PendingRequest } from '../core/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { FetchResponse } from './request.js';

/**
 * Something that can put a {@link PendingRequest} on the wire.
 * Resolves `[error, null]` only when no response was received at all.
 */
export interface HttpTransport {
  send(request: PendingRequest): SafeWrapAsync<Error, FetchResponse>;
}

/**
 * The identity-service side of every call: the current bearer token, and the
 * transport whose connections (and any retry policy) requests should reuse.
 */
export interface TokenProvider {
  /** Current bearer token; empty or stale when not authenticated, never throws. */
  token(): string;
  /** Transport shared with the identity service. */
  httpClient(): HttpTransport;
}
