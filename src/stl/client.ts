import { type ParsedSTLConfig, parseSTLConfig, type STLConfig } from '../config/config.js';
import { ServiceClient } from '../core/client.js';
import type { DebugObserver } from '../debug/types.js';
import type { ConfigurationError } from '../error/configurationError.js';
import type { TokenProvider } from '../types/transport.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { SafeWrap } from '../utils/wrap.js';
import { userAgentFor } from '../version.js';
import { AppsService } from './appsService.js';
import { GraphQLClient } from './graphql.js';

/** Extra wiring for an {@link STLClient}. */
export interface STLClientOptions {
  /** @default a pino logger named `careplane/stl` */
  logger?: Logger;
  /** Debug observer used instead of the file named by `debugLog`. */
  debug?: DebugObserver;
}

/**
 * Client of the application-resource service. Calls go over GraphQL to
 * `<stlUrl>/<graphqlPath>`; there is no root organization segment.
 */
export class STLClient {
  #client: ServiceClient;
  #config: ParsedSTLConfig;
  /** GraphQL endpoint, for operations the services do not cover. */
  readonly graphql: GraphQLClient;
  /** Application resources. */
  readonly apps: AppsService;

  private constructor(client: ServiceClient, config: ParsedSTLConfig) {
    this.#client = client;
    this.#config = config;
    this.graphql = new GraphQLClient(client, config.graphqlPath);
    this.apps = new AppsService(this.graphql);
  }

  /** Validates the config and creates the client. */
  static create(tokenProvider: TokenProvider, config: STLConfig, opts: STLClientOptions = {}): SafeWrap<Error, STLClient> {
    const [errConfig, parsed] = parseSTLConfig(config);
    if (errConfig) {
      return [errConfig, null];
    }

    const [errClient, client] = ServiceClient.create({
      baseUrl: parsed.stlUrl,
      tokenProvider,
      userAgent: userAgentFor('stl'),
      debugLog: parsed.debugLog,
      debug: opts.debug,
      logger: opts.logger ?? createLogger('careplane/stl'),
    });
    if (errClient) {
      return [errClient, null];
    }

    return [null, new STLClient(client, parsed)];
  }

  /** Base URL of the service, `''` when unset. */
  get stlUrl(): string {
    return this.#client.baseUrl;
  }

  /** Points the client at another deployment; an invalid URL leaves it unset. */
  setStlUrl(url: string): ConfigurationError | null {
    return this.#client.setBaseUrl(url);
  }

  /** GraphQL endpoint path below {@link stlUrl}. */
  get graphqlPath(): string {
    return this.#config.graphqlPath;
  }

  /** Releases the debug log. */
  close(): Promise<void> {
    return this.#client.close();
  }
}
