import type { FetchResponse } from '../types/request.js';

/**
 * A response from a platform service, with whatever the destination decoded.
 * For non-success statuses the body is left unread on {@link ServiceResponse.raw};
 * a successful response without destination has its body discarded.
 */
export class ServiceResponse<T = unknown> {
  /** Underlying fetch response. */
  #response: FetchResponse;
  /** Decoded body, `null` unless a structured destination decoded one. */
  #data: T | null;

  constructor(response: FetchResponse, data: T | null = null) {
    this.#response = response;
    this.#data = data;
  }

  /** HTTP status code. */
  get status(): number {
    return this.#response.status;
  }

  /** Response headers. */
  get headers(): Headers {
    return this.#response.headers;
  }

  /** Underlying fetch response. */
  get raw(): FetchResponse {
    return this.#response;
  }

  /** Decoded body. */
  get data(): T | null {
    return this.#data;
  }
}

/**
 * Result of executing a request. A response may accompany an error when one was
 * received, so callers can inspect status, headers and body of a failed call.
 */
export type ResponseWrap<T> =
  | [error: null, response: ServiceResponse<T>]
  | [error: Error, response: ServiceResponse<T> | null];
