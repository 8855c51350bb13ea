/**
 * Fetch entrypoint: exports the fetch-based transport and the static token provider.
 * @module
 */
export { type FetchFunction, FetchTransport, type FetchTransportOptions } from './client.js';
export { StaticTokenProvider } from './tokenProvider.js';
