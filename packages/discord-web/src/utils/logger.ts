/**
 * Leveled console logger.
 *
 * Everything goes to stderr so the CLI can print JSON results on stdout.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const levels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

let currentLevel = levels[parseLevel(process.env.LOG_LEVEL)];

function parseLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = levels[level];
}

export function getLogLevel(): LogLevel {
  const entry = Object.entries(levels).find(([, value]) => value === currentLevel);
  return entry && isLogLevel(entry[0]) ? entry[0] : 'info';
}

function formatTime(): string {
  return new Date().toISOString().slice(11, 23);
}

export interface Logger {
  error(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = (icon: string): string => `[${formatTime()}] ${icon} [${scope}]`;
  return {
    error: (msg, ...args) => {
      if (currentLevel >= 0) {
        console.error(`${prefix('❌')} ${msg}`, ...args);
      }
    },
    warn: (msg, ...args) => {
      if (currentLevel >= 1) {
        console.error(`${prefix('⚠️')} ${msg}`, ...args);
      }
    },
    info: (msg, ...args) => {
      if (currentLevel >= 2) {
        console.error(`${prefix('ℹ️')} ${msg}`, ...args);
      }
    },
    debug: (msg, ...args) => {
      if (currentLevel >= 3) {
        console.error(`${prefix('🔍')} ${msg}`, ...args);
      }
    },
  };
}

export const logger = createLogger('discord-web');
