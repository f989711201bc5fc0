import type { LoggerPort, LogLevel } from '@vehicle-dash/domain';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

/** The subset of `console` the logger writes through */
export interface ConsoleLike {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  tag?: string;
  out?: ConsoleLike;
}

/**
 * `[tag] message` logging on top of console, filtered by level.
 * debug/info go to stdout, warn/error to stderr.
 */
export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): LoggerPort {
  const level = opts.level ?? 'info';
  const out = opts.out ?? console;
  const prefix = opts.tag ? `[${opts.tag}]` : '[dashboard]';

  function enabled(l: LogLevel): boolean {
    return LEVEL_RANK[l] >= LEVEL_RANK[level];
  }

  return {
    debug(message, ...details) {
      if (enabled('debug')) out.log(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) out.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) out.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) out.error(`${prefix} ${message}`, ...details);
    },
    child(tag) {
      return createConsoleLogger({ level, tag, out });
    },
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
