export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Send debug/info to stderr too, e.g. when stdout carries the output document. */
  stderrOnly?: boolean;
}

/** Console logger that prefixes every line with `[TAG]`. */
export function createLogger(tag: string, { level = 'info', stderrOnly = false }: LoggerOptions = {}): Logger {
  const prefix = `[${tag}]`;
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];
  const out = stderrOnly ? console.error : console.log;
  return {
    debug: (...args) => { if (enabled('debug')) out(prefix, ...args); },
    info: (...args) => { if (enabled('info')) out(prefix, ...args); },
    warn: (...args) => { if (enabled('warn')) console.warn(prefix, ...args); },
    error: (...args) => { if (enabled('error')) console.error(prefix, ...args); },
  };
}
