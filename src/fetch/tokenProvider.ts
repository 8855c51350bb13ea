import type { HttpTransport, TokenProvider } from '../types/transport.js';
import { FetchTransport } from './client.js';

/**
 * Token provider holding a fixed token, for service accounts, scripts and tests.
 * The token can be swapped at runtime; every request built afterwards uses the new one.
 */
export class StaticTokenProvider implements TokenProvider {
  #token: string;
  #transport: HttpTransport;

  constructor(token: string, transport: HttpTransport = new FetchTransport()) {
    this.#token = token;
    this.#transport = transport;
  }

  token(): string {
    return this.#token;
  }

  /** Replaces the token handed out from now on. */
  setToken(token: string): void {
    this.#token = token;
  }

  httpClient(): HttpTransport {
    return this.#transport;
  }
}
