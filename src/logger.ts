import type { LogLevel } from './config.js';
import { dim, red, yellow } from './cli/colors.js';

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// Diagnostics go to stderr so stdout stays clean for --json output.
export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, paint: (s: string) => string, message: string) => {
    if (RANK[level] < RANK[currentLevel]) return;
    console.error(`${dim(`[${scope}]`)} ${paint(message)}`);
  };

  return {
    debug: message => emit('debug', dim, message),
    info: message => emit('info', s => s, message),
    warn: message => emit('warn', yellow, message),
    error: message => emit('error', red, message),
  };
}
