import { FileDebugSink } from '../debug/fileSink.js';
import type { DebugObserver } from '../debug/types.js';
import { ConfigurationError } from '../error/configurationError.js';
import type { HttpMethod } from '../types/request.js';
import type { TokenProvider } from '../types/transport.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { type SafeWrap, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { API_VERSION, userAgentFor } from '../version.js';
import { checkResponse } from './classify.js';
import { deliver } from './deliver.js';
import { type Destination, discard } from './destination.js';
import { applyOptions, type BodyBytes, isMutatingMethod, type OptionFunc, PendingRequest } from './request.js';
import { type ResponseWrap, ServiceResponse } from './response.js';

/** Configuration for constructing a {@link ServiceClient}. */
export interface ServiceClientProps {
  /** Base URL of the service (e.g. `https://cdr.example.org/store/fhir/`). A trailing `/` is added when missing. */
  baseUrl: string;
  /** Supplies the bearer token and the transport requests are sent through. */
  tokenProvider: TokenProvider;
  /**
   * Segment inserted between the base URL and every relative path, such as the
   * root organization of the FHIR store. Omit for services without one.
   */
  rootSegment?: string;
  /** @default `careplane/core/<version>` */
  userAgent?: string;
  /** Scheme of the `Authorization` header. @default `Bearer` */
  authScheme?: string;
  /** @default `1` */
  apiVersion?: string;
  /** Path of a file that request/response dumps are appended to. */
  debugLog?: string;
  /** Observer to use instead of a file sink. Takes precedence over `debugLog`. */
  debug?: DebugObserver;
  /** @default a silent pino logger named `careplane` */
  logger?: Logger;
}

/**
 * Parses and normalizes a base URL so that it always ends in `/`.
 */
export function parseBaseUrl(urlStr: string): SafeWrap<ConfigurationError, URL> {
  if (!urlStr) {
    return [new ConfigurationError('error base url cannot be empty'), null];
  }

  const normalized = urlStr.endsWith('/') ? urlStr : `${urlStr}/`;
  const [errParse, url] = safeWrap(() => new URL(normalized));
  if (errParse) {
    return [new ConfigurationError(`error parsing base url ${urlStr}`, [], { cause: errParse }), null];
  }

  return [null, url];
}

/**
 * Shared request/response pipeline every service module runs on:
 * - builds requests against a base URL (+ root segment) with per-call options,
 * - sends them through the token provider's transport,
 * - classifies the status and delivers the body to a destination,
 * - mirrors traffic to an optional debug observer.
 *
 * No retries, timeouts or cancellation happen here; a call completes or fails once.
 * All methods return error-first tuples.
 */
export class ServiceClient {
  /** Parsed base URL, always ending in `/`; `null` after a failed {@link setBaseUrl}. */
  #baseUrl: URL | null;
  #tokenProvider: TokenProvider;
  #rootSegment: string;
  #userAgent: string;
  #authScheme: string;
  #apiVersion: string;
  /** Debug observer, `null` when capture is off or the client is closed. */
  #debug: DebugObserver | null;
  #logger: Logger;

  private constructor(props: ServiceClientProps, baseUrl: URL) {
    this.#baseUrl = baseUrl;
    this.#tokenProvider = props.tokenProvider;
    this.#rootSegment = props.rootSegment ?? '';
    this.#userAgent = props.userAgent ?? userAgentFor('core');
    this.#authScheme = props.authScheme ?? 'Bearer';
    this.#apiVersion = props.apiVersion ?? API_VERSION;
    this.#logger = props.logger ?? createLogger('careplane');
    this.#debug = props.debug ?? (props.debugLog ? FileDebugSink.open(props.debugLog, this.#logger) : null);
  }

  /**
   * Creates a client. Fails with a {@link ConfigurationError} when the base URL is
   * empty or unparsable; a debug log that cannot be opened only disables capture.
   */
  static create(props: ServiceClientProps): SafeWrap<Error, ServiceClient> {
    const [errUrl, baseUrl] = parseBaseUrl(props.baseUrl);
    if (errUrl) {
      return [errUrl, null];
    }

    return [null, new ServiceClient(props, baseUrl)];
  }

  /** Base URL as configured, `''` when unset. */
  get baseUrl(): string {
    return this.#baseUrl?.toString() ?? '';
  }

  /** User-Agent sent with every request. */
  get userAgent(): string {
    return this.#userAgent;
  }

  /**
   * Points the client at a different base URL. On failure the previous URL is
   * dropped as well, and builds fail until a valid URL is set.
   */
  setBaseUrl(urlStr: string): ConfigurationError | null {
    const [errUrl, baseUrl] = parseBaseUrl(urlStr);
    this.#baseUrl = baseUrl;
    return errUrl;
  }

  /**
   * Builds a request for a path relative to the base URL (no leading `/`).
   *
   * - The path is appended verbatim after the base path and root segment.
   * - Options run in order; the first failure is returned unchanged.
   * - POST, PUT and PATCH carry `body` and drop any query; GET and DELETE ignore it.
   * - `Accept`, `Authorization`, `API-Version` and `User-Agent` are set last,
   *   so options cannot override them. The token is read fresh on every build.
   */
  build(
    method: HttpMethod,
    path: string,
    body?: BodyBytes | null,
    options: ReadonlyArray<OptionFunc | null | undefined> = [],
  ): SafeWrap<Error, PendingRequest> {
    const base = this.#baseUrl;
    if (!base) {
      return [new ConfigurationError('error base url is not set'), null];
    }

    const opaque = this.#rootSegment ? `${base.pathname}${this.#rootSegment}/${path}` : `${base.pathname}${path}`;
    const request = new PendingRequest(method, base, opaque);

    const errOption = applyOptions(request, options);
    if (errOption) {
      return [errOption, null];
    }

    if (isMutatingMethod(method)) {
      request.attachBody(body ?? new Uint8Array());
    }

    request.headers.set('Accept', '*/*');
    request.headers.set('Authorization', `${this.#authScheme} ${this.#tokenProvider.token()}`);
    request.headers.set('API-Version', this.#apiVersion);
    if (this.#userAgent) {
      request.headers.set('User-Agent', this.#userAgent);
    }

    return [null, request];
  }

  /**
   * Sends a built request and classifies the response.
   *
   * - Transport failures come back as `[error, null]`, unwrapped.
   * - Statuses outside 200/201/202/204/304 come back as
   *   `[NonSuccessStatusError, response]` with the body unread.
   * - Otherwise the body goes to `destination`; a decode failure comes back
   *   as `[DecodeError, response]`.
   */
  async execute<T = never>(request: PendingRequest, destination: Destination<T> = discard()): Promise<ResponseWrap<T>> {
    const debug = this.#debug;
    if (debug) {
      await this.#capture('request', () => debug.onRequest(request));
    }

    this.#logger.debug({ method: request.method, url: request.url }, 'sending request');
    const [errSend, response] = await this.#tokenProvider.httpClient().send(request);
    if (errSend) {
      this.#logger.debug({ err: errSend, method: request.method, url: request.url }, 'transport failure');
      return [errSend, null];
    }

    if (debug) {
      await this.#capture('response', () => debug.onResponse(response));
    }

    this.#logger.debug({ method: request.method, url: request.url, status: response.status }, 'received response');

    const errStatus = checkResponse(response.status);
    if (errStatus) {
      // Body stays unread for the caller to inspect
      return [errStatus, new ServiceResponse<T>(response)];
    }

    const [errDeliver, data] = await deliver(response, destination);
    if (errDeliver) {
      return [errDeliver, new ServiceResponse<T>(response)];
    }

    return [null, new ServiceResponse(response, data)];
  }

  /**
   * Builds and executes in one go. Build failures come back as `[error, null]`.
   */
  async do<T = never>(
    method: HttpMethod,
    path: string,
    body: BodyBytes | null,
    options: ReadonlyArray<OptionFunc | null | undefined>,
    destination: Destination<T> = discard(),
  ): Promise<ResponseWrap<T>> {
    const [errBuild, request] = this.build(method, path, body, options);
    if (errBuild) {
      return [errBuild, null];
    }

    return this.execute(request, destination);
  }

  /**
   * Releases the debug observer. Later calls skip capture; closing twice is a no-op.
   */
  async close(): Promise<void> {
    const debug = this.#debug;
    this.#debug = null;
    if (debug) {
      await this.#capture('close', () => debug.close());
    }
  }

  /** Runs a debug hook; its failures never reach the caller. */
  async #capture(stage: string, hook: () => void | Promise<void>): Promise<void> {
    const [errHook] = await safeWrapAsync(async () => hook());
    if (errHook) {
      this.#logger.debug({ err: errHook, stage }, 'debug capture failed');
    }
  }
}
