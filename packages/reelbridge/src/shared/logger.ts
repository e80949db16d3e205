/**
 * Console logger with levels and a scope prefix.
 * Writes to stderr so CLI output on stdout stays machine-readable.
 */

import { cyan, dim, red, yellow } from 'colorette';

import type { LogLevel } from './types.js';

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
  child(scope: string): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

const envLevel = process.env.REELBRIDGE_LOG_LEVEL;
let defaultLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/** Change the level used by loggers created afterwards */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export function createLogger(scope: string, level: LogLevel = defaultLevel): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = cyan(`[${scope}]`);

  const write = (lvl: Exclude<LogLevel, 'silent'>, message: string) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    switch (lvl) {
      case 'debug':
        console.error(`${prefix} ${dim(message)}`);
        break;
      case 'info':
        console.error(`${prefix} ${message}`);
        break;
      case 'warn':
        console.error(`${prefix} ${yellow(message)}`);
        break;
      case 'error':
        console.error(`${prefix} ${red(message)}`);
        break;
    }
  };

  return {
    debug: (m) => write('debug', m),
    info: (m) => write('info', m),
    warn: (m) => write('warn', m),
    error: (m) => write('error', m),
    child: (sub) => createLogger(`${scope}:${sub}`, level),
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
