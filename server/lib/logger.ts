/**
 * Logger — tagged console output for the daemon's subsystems.
 *
 * Lines look like:
 *   [2026-01-01T00:00:00.000Z] [supervisor] [info] Model 'alpha' is running
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export function createLogger(tag: string): Logger {
  const write = (level: LogLevel, msg: string): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const line = `[${new Date().toISOString()}] [${tag}] [${level}] ${msg}`;
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (msg) => write('debug', msg),
    info:  (msg) => write('info', msg),
    warn:  (msg) => write('warn', msg),
    error: (msg) => write('error', msg),
  };
}
