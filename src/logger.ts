/**
 * Line-oriented logger
 *
 * All logging goes to stderr so stdout stays reserved for structured output.
 * Lines look like: [INFO] [session] Engine ready (pid 4242)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

let defaultLevel: LogLevel = resolveLevel(process.env.EDA_BRIDGE_LOG_LEVEL) ?? 'info';

/**
 * Parse a level name, returning undefined for anything unrecognized
 */
export function resolveLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Change the level used by loggers created without an explicit level
 */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export function getDefaultLogLevel(): LogLevel {
  return defaultLevel;
}

/**
 * Create a scoped logger
 * @param scope - Component name printed in every line
 * @param level - Minimum level; follows the default level when omitted
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const enabled = (messageLevel: LogLevel): boolean =>
    LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[level ?? defaultLevel];

  const write = (messageLevel: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (enabled(messageLevel)) {
      console.error(`[${messageLevel.toUpperCase()}] [${scope}] ${message}`);
    }
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level),
  };
}
