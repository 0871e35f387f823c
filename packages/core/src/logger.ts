/** Logger interface handed to every component. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Sink for formatted lines; defaults to `console.error`. */
export type LogSink = (line: string, ...args: unknown[]) => void;

/**
 * Logger that writes `[LEVEL] message` lines.
 *
 * Everything goes to stderr by default: stdout carries the MCP stdio
 * protocol and must not receive anything else.
 */
export function createConsoleLogger(
  level: LogLevel = 'info',
  sink: LogSink = (line, ...args) => console.error(line, ...args),
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit =
    (lvl: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (LOG_LEVELS.indexOf(lvl) < threshold) return;
      sink(`[${lvl.toUpperCase()}] ${message}`, ...args);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
