/**
 * Root entrypoint for careplane: re-exports the transport foundation, the
 * service modules, and error utilities from a single module surface.
 * @module
 */

/** Clinical data repository (FHIR store) client and its services. */
export * from './cdr/index.js';

/** Configuration schemas and parsing. */
export {
  type CDRConfig,
  cdrConfigSchema,
  DEFAULT_GRAPHQL_PATH,
  FHIR_STORE_SUFFIX,
  type IronConfig,
  ironConfigSchema,
  type ParsedCDRConfig,
  type ParsedIronConfig,
  type ParsedSTLConfig,
  parseCDRConfig,
  parseIronConfig,
  parseSTLConfig,
  resolveStoreUrl,
  type STLConfig,
  stlConfigSchema,
} from './config/config.js';

/** Shared request/response pipeline. */
export * from './core/index.js';

/** Request/response capture. */
export * from './debug/index.js';

/** Typed errors and the helpers for identifying and unwrapping them. */
export * from './error/index.js';

/** Fetch-based transport and a fixed-token provider. */
export * from './fetch/index.js';

/** Job scheduler client. */
export * from './iron/index.js';

/** Application-resource service client. */
export * from './stl/index.js';

/** Wire-level types shared by transports. */
export type { FetchResponse, HttpMethod, MutatingMethod, StatusCode } from './types/request.js';
export type { HttpTransport, TokenProvider } from './types/transport.js';

/** Logger factory used for every client's default logger. */
export { createLogger, LOG_LEVEL_ENV, type Logger } from './utils/logger.js';

/** Schema validation into error-first tuples. */
export { validator } from './utils/validator.js';

/** Tuple-based result helpers. */
export { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync, toError } from './utils/wrap.js';

/** Library and API versions reported to the platform. */
export { API_VERSION, LIBRARY_VERSION, userAgentFor } from './version.js';
