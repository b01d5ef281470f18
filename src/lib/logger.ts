import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

export const logger: Logger = {
  debug(message: string) {
    if (shouldLog('debug')) {
      console.log(chalk.gray(message));
    }
  },
  info(message: string) {
    if (shouldLog('info')) {
      console.log(message);
    }
  },
  warn(message: string) {
    if (shouldLog('warn')) {
      console.warn(chalk.yellow(`⚠️  ${message}`));
    }
  },
  error(message: string) {
    if (shouldLog('error')) {
      console.error(chalk.red(`✗ ${message}`));
    }
  },
};
