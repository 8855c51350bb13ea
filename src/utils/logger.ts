import { type Logger, type LoggerOptions, pino } from 'pino';

export type { Logger };

/** Environment variable read for the default log level. */
export const LOG_LEVEL_ENV = 'CAREPLANE_LOG_LEVEL';

/**
 * Creates the default logger for a client module. Silent unless
 * `CAREPLANE_LOG_LEVEL` asks for more.
 */
export function createLogger(name: string, opts: Omit<LoggerOptions, 'name'> = {}): Logger {
  return pino({
    level: process.env[LOG_LEVEL_ENV]?.trim() || 'silent',
    ...opts,
    name,
  });
}
