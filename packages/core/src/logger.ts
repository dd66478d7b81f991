/** Logger injected into every fabric component. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface ConsoleLoggerOptions {
  /** Minimum level written. Default: 'info'. */
  level?: LogLevel;
  /** Prepended to every line, e.g. a fabric name. */
  prefix?: string;
}

/** Console-backed logger with `[LEVEL]` tags. */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const tag = (level: LogLevel, msg: string): string => {
    const head = `[${level.toUpperCase()}]`;
    return options.prefix ? `${head} ${options.prefix} ${msg}` : `${head} ${msg}`;
  };
  const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

  return {
    debug: (msg, ...args) => { if (enabled('debug')) console.debug(tag('debug', msg), ...args); },
    info: (msg, ...args) => { if (enabled('info')) console.log(tag('info', msg), ...args); },
    warn: (msg, ...args) => { if (enabled('warn')) console.warn(tag('warn', msg), ...args); },
    error: (msg, ...args) => { if (enabled('error')) console.error(tag('error', msg), ...args); },
  };
}

/** Discards everything. Default when no logger is supplied. */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
