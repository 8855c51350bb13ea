import { type IronConfig, type ParsedIronConfig, parseIronConfig } from '../config/config.js';
import { ServiceClient } from '../core/client.js';
import type { DebugObserver } from '../debug/types.js';
import { StaticTokenProvider } from '../fetch/tokenProvider.js';
import type { HttpTransport } from '../types/transport.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { SafeWrap } from '../utils/wrap.js';
import { userAgentFor } from '../version.js';
import { CodesService } from './codesService.js';
import { SchedulesService } from './schedulesService.js';
import { TasksService } from './tasksService.js';

/** Extra wiring for an {@link IronClient}. */
export interface IronClientOptions {
  /** @default a pino logger named `careplane/iron` */
  logger?: Logger;
  /** Debug observer used instead of the file named by `debugLog`. */
  debug?: DebugObserver;
  /** @default a fetch transport on the global `fetch` */
  transport?: HttpTransport;
}

/**
 * Client of the job scheduler. The project token from the config is sent as
 * `Authorization: OAuth <token>` and every path is scoped to
 * `/2/projects/<projectId>`.
 *
 * @example
 * const [err, iron] = IronClient.create({ baseUrl: 'https://iron.example.org', projectId: 'project-1', token });
 * if (err) throw err;
 * const [errQueue, response] = await iron.tasks.queueTasks([{ code_name: 'export', payload: '{}' }]);
 */
export class IronClient {
  #client: ServiceClient;
  #config: ParsedIronConfig;
  /** Task queueing and inspection. */
  readonly tasks: TasksService;
  /** Delayed and recurring runs. */
  readonly schedules: SchedulesService;
  /** Code packages. */
  readonly codes: CodesService;

  private constructor(client: ServiceClient, config: ParsedIronConfig) {
    this.#client = client;
    this.#config = config;
    this.tasks = new TasksService(client);
    this.schedules = new SchedulesService(client);
    this.codes = new CodesService(client);
  }

  /** Validates the config and creates the client. */
  static create(config: IronConfig, opts: IronClientOptions = {}): SafeWrap<Error, IronClient> {
    const [errConfig, parsed] = parseIronConfig(config);
    if (errConfig) {
      return [errConfig, null];
    }

    const [errClient, client] = ServiceClient.create({
      baseUrl: parsed.baseUrl,
      tokenProvider: new StaticTokenProvider(parsed.token, opts.transport),
      rootSegment: `2/projects/${parsed.projectId}`,
      authScheme: 'OAuth',
      userAgent: userAgentFor('iron'),
      debugLog: parsed.debugLog,
      debug: opts.debug,
      logger: opts.logger ?? createLogger('careplane/iron'),
    });
    if (errClient) {
      return [errClient, null];
    }

    return [null, new IronClient(client, parsed)];
  }

  get projectId(): string {
    return this.#config.projectId;
  }

  /** Base URL of the scheduler, `''` when unset. */
  get baseUrl(): string {
    return this.#client.baseUrl;
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
