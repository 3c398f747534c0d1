/**
 * Logger utility for @nexus-core/runtime
 *
 * The runtime shares the SDK's Logger contract so one instance can be handed
 * to the signed HTTP engine, the event poller and the client facade alike.
 * Only the default prefix differs.
 */

import {
  createLogger as createSdkLogger,
  parseLogLevel,
  silentLogger,
  type LogLevel,
  type Logger,
} from '@nexus-core/sdk';

export type { LogLevel, Logger };
export { silentLogger };

export const RUNTIME_LOG_PREFIX = '[Nexus Runtime]';

/**
 * Create a logger instance with the specified minimum level
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param prefix - Prefix for log messages (default: '[Nexus Runtime]')
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', '[tool]');
 * logger.info('listening'); // 2026-01-21T12:00:00.000Z INFO  [tool] listening
 * ```
 */
export function createLogger(minLevel: LogLevel = 'info', prefix = RUNTIME_LOG_PREFIX): Logger {
  return createSdkLogger(minLevel, prefix);
}

/**
 * Console logger at the level named by `NEXUS_LOG_LEVEL`; silent when the
 * variable is unset or not a level name.
 */
export function loggerFromEnv(env: NodeJS.ProcessEnv = process.env, prefix = RUNTIME_LOG_PREFIX): Logger {
  const level = parseLogLevel(env.NEXUS_LOG_LEVEL);
  return level === undefined ? silentLogger : createLogger(level, prefix);
}
