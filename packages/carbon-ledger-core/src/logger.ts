/**
 * Structured logging
 *
 * One JSON object per line. Errors and warnings go to stderr, everything
 * else to stdout. Level comes from LEDGER_LOG_LEVEL (default: info).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function currentLevel(): LogLevel {
  const raw = (process.env.LEDGER_LOG_LEVEL || '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export function createLogger(component: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel()]) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...meta
    });

    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta)
  };
}

export function errorMeta(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    return { error: error.message, error_name: error.name, ...(code !== undefined ? { error_code: code } : {}) };
  }
  return { error: String(error) };
}
