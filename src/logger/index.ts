/**
 * Logger Module
 *
 * Every stage takes a Logger so the orchestrator (or a test) can capture
 * stage output. The console logger prefixes each line with its level and
 * drops anything below the configured threshold.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create a console logger that ignores messages below `level`
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    info: (msg, meta) => {
      if (enabled('info')) console.log(`[INFO] ${msg}`, meta || '');
    },
    warn: (msg, meta) => {
      if (enabled('warn')) console.warn(`[WARN] ${msg}`, meta || '');
    },
    error: (msg, meta) => {
      if (enabled('error')) console.error(`[ERROR] ${msg}`, meta || '');
    },
    debug: (msg, meta) => {
      if (enabled('debug')) console.debug(`[DEBUG] ${msg}`, meta || '');
    },
  };
}

export const defaultLogger: Logger = createConsoleLogger('info');

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
