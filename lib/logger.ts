import { DEBUG_CONFIG, type LogLevel } from './env';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

function isEnabled(level: LogLevel): boolean {
  // DEBUG=true always lets debug output through
  const threshold = DEBUG_CONFIG.DEBUG ? 'debug' : DEBUG_CONFIG.LOG_LEVEL;
  return LEVEL_ORDER[level] <= LEVEL_ORDER[threshold];
}

/**
 * Console logger that prefixes every line with a `[Tag]`
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    error(message, ...details) {
      if (isEnabled('error')) console.error(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (isEnabled('warn')) console.warn(prefix, message, ...details);
    },
    info(message, ...details) {
      if (isEnabled('info')) console.log(prefix, message, ...details);
    },
    debug(message, ...details) {
      if (isEnabled('debug')) console.debug(prefix, message, ...details);
    },
  };
}
