/**
 * Scoped logger writing `[scope] message` lines to stderr.
 * stdout is left to progress output and the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message) {
      if (enabled('debug')) console.error(`${prefix} ${message}`);
    },
    info(message) {
      if (enabled('info')) console.error(`${prefix} ${message}`);
    },
    warn(message, error) {
      if (!enabled('warn')) return;
      if (error === undefined) console.error(`${prefix} WARN: ${message}`);
      else console.error(`${prefix} WARN: ${message}`, error);
    },
    error(message, error) {
      if (!enabled('error')) return;
      if (error === undefined) console.error(`${prefix} ERROR: ${message}`);
      else console.error(`${prefix} ERROR: ${message}`, error);
    },
  };
}
