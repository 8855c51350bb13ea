import type { HttpMethod, MutatingMethod } from '../types/request.js';
import { safeWrap } from '../utils/wrap.js';

/** Request body as raw bytes, or text that is sent UTF-8 encoded. */
export type BodyBytes = Uint8Array | string;

/**
 * Per-call mutation applied to a request before it is sent.
 * Returning (or throwing) an error aborts the build.
 */
export type OptionFunc = (request: PendingRequest) => Error | null | void;

const MUTATING_METHODS: readonly HttpMethod[] = ['POST', 'PUT', 'PATCH'];
const encoder = new TextEncoder();

/** Whether requests with this method carry a body. */
export function isMutatingMethod(method: HttpMethod): method is MutatingMethod {
  return MUTATING_METHODS.includes(method);
}

/**
 * One outbound call in the making. The path is kept opaque: it is appended to
 * the origin as given, so caller-side escaping survives untouched.
 */
export class PendingRequest {
  /** HTTP method of the call. */
  readonly method: HttpMethod;
  /** Headers sent with the call. */
  readonly headers = new Headers();
  /** Query parameters; options may add to these, bodies clear them. */
  query: URLSearchParams;
  /** `protocol//host` of the base URL. */
  #origin: string;
  /** Host of the base URL. */
  #host: string;
  /** Opaque path, starting with `/`, without query. */
  #opaque: string;
  /** Body bytes, only ever set for mutating methods. */
  #body: Uint8Array<ArrayBuffer> | null = null;

  /**
   * A `?` in `opaque` starts its query: the part before it stays the opaque
   * path, the parameters after it seed {@link query}.
   */
  constructor(method: HttpMethod, base: URL, opaque: string) {
    this.method = method;
    this.#origin = `${base.protocol}//${base.host}`;
    this.#host = base.host;
    this.query = new URLSearchParams(base.search);

    const queryStart = opaque.indexOf('?');
    if (queryStart === -1) {
      this.#opaque = opaque;
      return;
    }

    this.#opaque = opaque.slice(0, queryStart);
    for (const [name, value] of new URLSearchParams(opaque.slice(queryStart + 1))) {
      this.query.append(name, value);
    }
  }

  /** Host the call is addressed to. */
  get host(): string {
    return this.#host;
  }

  /** Opaque path the call is addressed to. */
  get opaque(): string {
    return this.#opaque;
  }

  /** Path plus query, as written on the request line. */
  get requestUri(): string {
    const search = this.query.toString();
    return search ? `${this.#opaque}?${search}` : this.#opaque;
  }

  /** Absolute URL of the call. */
  get url(): string {
    return `${this.#origin}${this.requestUri}`;
  }

  /** Body bytes, `null` when none are attached. */
  get body(): Uint8Array<ArrayBuffer> | null {
    return this.#body;
  }

  /** Byte length of the attached body. */
  get contentLength(): number {
    return this.#body?.byteLength ?? 0;
  }

  /**
   * Attaches the body and drops any query an option may have set,
   * so that a request carries its parameters in exactly one place.
   */
  attachBody(body: BodyBytes): void {
    const bytes = typeof body === 'string' ? encoder.encode(body) : body;
    // fetch only takes ArrayBuffer-backed views
    this.#body = new Uint8Array(bytes);
    this.query = new URLSearchParams();
  }
}

/**
 * Runs each option against the request in order. Nullish entries are skipped.
 * The first failure stops the chain and is returned as-is.
 */
export function applyOptions(
  request: PendingRequest,
  options: ReadonlyArray<OptionFunc | null | undefined>,
): Error | null {
  for (const option of options) {
    if (!option) {
      continue;
    }

    const [errThrown, result] = safeWrap(() => option(request));
    if (errThrown) {
      return errThrown;
    }

    if (result) {
      return result;
    }
  }

  return null;
}
