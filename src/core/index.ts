/**
 * Core entrypoint: exports the request/response pipeline every service module runs on.
 * Import from here to build a client for a service this package does not cover.
 * @module
 */

/**
 * Configuration accepted by {@link ServiceClient.create}.
 */
export type { ServiceClientProps } from './client.js';

/**
 * Shared transport foundation that:
 * - builds authenticated requests against a base URL and root segment,
 * - sends them through the token provider's transport,
 * - classifies statuses and delivers bodies to a destination,
 * - mirrors traffic to an optional debug observer.
 *
 * All methods return error-first tuples.
 */
export { parseBaseUrl, ServiceClient } from './client.js';

/** Success set and status classification. */
export { checkResponse, SUCCESS_STATUS_CODES } from './classify.js';

/** Where a successful response body goes. */
export {
  type ByteSink,
  type Destination,
  discard,
  type NoDestination,
  type RawDestination,
  type StructuredDestination,
  structured,
  toSink,
} from './destination.js';

/** Per-call request options. */
export { type QueryValue, withContentType, withHeader, withQuery } from './options.js';

/** Request under construction and the option chain run over it. */
export { applyOptions, type BodyBytes, isMutatingMethod, type OptionFunc, PendingRequest } from './request.js';

/** Response wrapper and call result. */
export { type ResponseWrap, ServiceResponse } from './response.js';
