// Structured logging

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = keyof Logger;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Console logger that drops entries below `minLevel`
 */
export function createConsoleLogger(minLevel: LogLevel = 'debug'): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const enabled = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= threshold;

  return {
    debug(message: string, data?: Record<string, unknown>) {
      if (enabled('debug')) console.debug(`[DEBUG] ${message}`, data ?? '');
    },
    info(message: string, data?: Record<string, unknown>) {
      if (enabled('info')) console.info(`[INFO] ${message}`, data ?? '');
    },
    warn(message: string, data?: Record<string, unknown>) {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, data ?? '');
    },
    error(message: string, data?: Record<string, unknown>) {
      if (enabled('error')) console.error(`[ERROR] ${message}`, data ?? '');
    },
  };
}

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
