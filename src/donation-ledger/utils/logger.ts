/**
 * Donation Ledger - Logger
 *
 * Console logger with a fixed line format and a minimum level.
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
}

function formatLog(level: Exclude<LogLevel, 'silent'>, source: string, message: string): string {
  return `[${new Date().toISOString()}] [${level.toUpperCase()}] [${source}] ${message}`;
}

/** Create a logger tagged with the emitting component's name */
export function createLogger(source: string, minLevel: LogLevel = 'info'): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

  return {
    debug: (message: string) => {
      if (enabled('debug')) console.debug(formatLog('debug', source, message));
    },
    info: (message: string) => {
      if (enabled('info')) console.log(formatLog('info', source, message));
    },
    warn: (message: string) => {
      if (enabled('warn')) console.warn(formatLog('warn', source, message));
    },
    error: (message: string) => {
      if (enabled('error')) console.error(formatLog('error', source, message));
    },
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger('silent', 'silent');
