import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.log(chalk.gray(prefix), chalk.gray(message), ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(chalk.cyan(prefix), message, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.error(chalk.yellow(prefix), chalk.yellow(message), ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(chalk.red(prefix), chalk.red(message), ...args);
    },
  };
}
