/**
 * Logger utility for the Nexus SDK.
 *
 * Dependency-free console logging with a configurable minimum level. The SDK
 * keeps one module-level logger that standalone helpers (crawler, signer,
 * decoders) fall back to when no logger is injected.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

/**
 * Create a logger instance with the specified minimum level
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param prefix - Prefix for log messages (default: '[Nexus SDK]')
 */
export function createLogger(
  minLevel: LogLevel = "info",
  prefix = "[Nexus SDK]",
): Logger {
  let currentLevel = LOG_LEVELS[minLevel];

  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] < currentLevel) {
      return;
    }
    const timestamp = new Date().toISOString();
    const fullMessage = `${timestamp} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;

    switch (level) {
      case "debug":
        console.debug(fullMessage, ...args);
        break;
      case "info":
        console.info(fullMessage, ...args);
        break;
      case "warn":
        console.warn(fullMessage, ...args);
        break;
      case "error":
        console.error(fullMessage, ...args);
        break;
    }
  };

  return {
    debug: (message, ...args) => log("debug", message, ...args),
    info: (message, ...args) => log("info", message, ...args),
    warn: (message, ...args) => log("warn", message, ...args),
    error: (message, ...args) => log("error", message, ...args),
    setLevel: (level) => {
      currentLevel = LOG_LEVELS[level];
    },
  };
}

/**
 * No-op logger for silent operation
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
};

/**
 * Parse a level name such as the value of `NEXUS_LOG_LEVEL`.
 * Returns `undefined` for unknown or empty input.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return normalized;
    default:
      return undefined;
  }
}

let sdkLogger: Logger = silentLogger;

/**
 * Set the global SDK log level. Creates a new console logger with the
 * specified level; affects every helper that uses getSdkLogger().
 */
export function setSdkLogLevel(level: LogLevel): void {
  sdkLogger = createLogger(level);
}

/**
 * Replace the global SDK logger, e.g. to route output into an application
 * logger. Pass `silentLogger` to mute it again.
 */
export function setSdkLogger(logger: Logger): void {
  sdkLogger = logger;
}

/**
 * Get the global SDK logger instance.
 * Returns silentLogger by default until setSdkLogLevel() is called.
 */
export function getSdkLogger(): Logger {
  return sdkLogger;
}
