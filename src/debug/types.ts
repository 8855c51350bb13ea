import type { PendingRequest } from '../core/request.js';
import type { FetchResponse } from '../types/request.js';

/**
 * Observer invoked before each request is sent and after each response arrives.
 * Whatever it throws or rejects with is discarded by the client.
 */
export interface DebugObserver {
  onRequest(request: PendingRequest): void | Promise<void>;
  onResponse(response: FetchResponse): void | Promise<void>;
  /** Releases the observer's resources; later calls must be no-ops. */
  close(): void | Promise<void>;
}
