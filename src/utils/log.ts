export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const RANK: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4, trace: 5 };

export interface Logger {
  readonly level: LogLevel;
  enabled(level: LogLevel): boolean;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
}

export function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(RANK, v);
}

export function levelFromEnv(env: Record<string, string | undefined> = process.env): LogLevel {
  const raw = (env.CHIP8_LOG ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

// Tag-prefixed console logger, e.g. "[sched] halted: ...".
export function createLogger(tag: string, level: LogLevel = levelFromEnv()): Logger {
  const enabled = (l: LogLevel) => l !== 'silent' && RANK[l] <= RANK[level];
  const prefix = `[${tag}]`;
  return {
    level,
    enabled,
    error: (...args) => { if (enabled('error')) console.error(prefix, ...args); },
    warn: (...args) => { if (enabled('warn')) console.warn(prefix, ...args); },
    info: (...args) => { if (enabled('info')) console.log(prefix, ...args); },
    debug: (...args) => { if (enabled('debug')) console.log(prefix, ...args); },
    trace: (...args) => { if (enabled('trace')) console.log(prefix, ...args); },
  };
}
