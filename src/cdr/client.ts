import { type CDRConfig, type ParsedCDRConfig, parseCDRConfig, resolveStoreUrl } from '../config/config.js';
import { ServiceClient } from '../core/client.js';
import type { DebugObserver } from '../debug/types.js';
import type { ConfigurationError } from '../error/configurationError.js';
import type { TokenProvider } from '../types/transport.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { SafeWrap } from '../utils/wrap.js';
import { userAgentFor } from '../version.js';
import { OperationsService } from './operationsService.js';
import { TenantService } from './tenantService.js';

/** Extra wiring for a {@link CDRClient}. */
export interface CDRClientOptions {
  /** @default a pino logger named `careplane/cdr` */
  logger?: Logger;
  /** Debug observer used instead of the file named by `debugLog`. */
  debug?: DebugObserver;
}

/**
 * Client of the clinical data repository, a FHIR STU3 store. Every resource
 * path is scoped to the configured root organization.
 *
 * @example
 * const [err, cdr] = CDRClient.create(tokenProvider, { rootOrgId: 'org1', cdrUrl: 'https://cdr.example.org' });
 * if (err) throw err;
 * const [errGet, response] = await cdr.operations.get('Patient/123');
 */
export class CDRClient {
  #client: ServiceClient;
  #config: ParsedCDRConfig;
  /** Organization onboarding and lookup. */
  readonly tenant: TenantService;
  /** Generic resource operations. */
  readonly operations: OperationsService;

  private constructor(client: ServiceClient, config: ParsedCDRConfig) {
    this.#client = client;
    this.#config = config;
    this.tenant = new TenantService(client);
    this.operations = new OperationsService(client);
  }

  /**
   * Validates the config and creates the client.
   * Fails with a `ConfigurationError` for invalid settings or an unusable store URL.
   */
  static create(tokenProvider: TokenProvider, config: CDRConfig, opts: CDRClientOptions = {}): SafeWrap<Error, CDRClient> {
    const [errConfig, parsed] = parseCDRConfig(config);
    if (errConfig) {
      return [errConfig, null];
    }

    const [errClient, client] = ServiceClient.create({
      baseUrl: resolveStoreUrl(parsed),
      tokenProvider,
      rootSegment: parsed.rootOrgId,
      userAgent: userAgentFor('cdr'),
      debugLog: parsed.debugLog,
      debug: opts.debug,
      logger: opts.logger ?? createLogger('careplane/cdr'),
    });
    if (errClient) {
      return [errClient, null];
    }

    return [null, new CDRClient(client, parsed)];
  }

  /** FHIR store URL requests are resolved against, `''` when unset. */
  get fhirStoreUrl(): string {
    return this.#client.baseUrl;
  }

  /** Points the client at another FHIR store; an invalid URL leaves it unset. */
  setFhirStoreUrl(url: string): ConfigurationError | null {
    return this.#client.setBaseUrl(url);
  }

  get rootOrgId(): string {
    return this.#config.rootOrgId;
  }

  /** Time zone for resource encoders; the transport never reads it. */
  get timeZone(): string {
    return this.#config.timeZone;
  }

  /** Underlying transport, for calls the services do not cover. */
  get serviceClient(): ServiceClient {
    return this.#client;
  }

  /** Releases the debug log. */
  close(): Promise<void> {
    return this.#client.close();
  }
}
