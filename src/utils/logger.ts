export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(scope: string, level: LogLevel = 'warn'): Logger {
  const enabled = (l: Exclude<LogLevel, 'silent'>) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
  return {
    error: (msg, ctx) => {
      if (enabled('error')) console.error(`[${scope}] ${msg}`, ctx || '');
    },
    warn: (msg, ctx) => {
      if (enabled('warn')) console.warn(`[${scope}] ${msg}`, ctx || '');
    },
    info: (msg, ctx) => {
      if (enabled('info')) console.info(`[${scope}] ${msg}`, ctx || '');
    },
    debug: (msg, ctx) => {
      if (enabled('debug')) console.debug(`[${scope}] ${msg}`, ctx || '');
    },
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
