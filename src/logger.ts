import type { Logger, LogLevel } from './types.js';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Level-filtered console logger.
 *
 * Everything goes to stderr so that stdout carries only the JSON payload
 * printed by the CLI.
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const currentLevel = LEVELS.indexOf(level);

  return {
    error: (msg: string, meta?: unknown) => {
      if (currentLevel >= 0) console.error(`[DOCS ERROR] ${msg}`, meta ?? '');
    },
    warn: (msg: string, meta?: unknown) => {
      if (currentLevel >= 1) console.error(`[DOCS WARN] ${msg}`, meta ?? '');
    },
    info: (msg: string, meta?: unknown) => {
      if (currentLevel >= 2) console.error(`[DOCS INFO] ${msg}`, meta ?? '');
    },
    debug: (msg: string, meta?: unknown) => {
      if (currentLevel >= 3) console.error(`[DOCS DEBUG] ${msg}`, meta ?? '');
    },
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as string[]).includes(value);
}
