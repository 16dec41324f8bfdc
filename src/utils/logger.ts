// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatTimestamp(): string {
  return new Date().toISOString().substring(11, 19);
}

export function debug(message: string, ...args: unknown[]): void {
  if (shouldLog('debug')) {
    console.log(chalk.gray(`[${formatTimestamp()}] DEBUG:`), message, ...args);
  }
}

export function info(message: string, ...args: unknown[]): void {
  if (shouldLog('info')) {
    console.log(chalk.blue(`[${formatTimestamp()}]`), message, ...args);
  }
}

export function success(message: string, ...args: unknown[]): void {
  if (shouldLog('info')) {
    console.log(chalk.green(`[${formatTimestamp()}] ✓`), message, ...args);
  }
}

// warn and error write to stderr
export function warn(message: string, ...args: unknown[]): void {
  if (shouldLog('warn')) {
    console.error(chalk.yellow(`[${formatTimestamp()}] ⚠`), message, ...args);
  }
}

export function error(message: string, ...args: unknown[]): void {
  if (shouldLog('error')) {
    console.error(chalk.red(`[${formatTimestamp()}] ✗`), message, ...args);
  }
}

/**
 * Color a pull-request state or ticket status name.
 */
export function stateColor(state: string): string {
  switch (state.toLowerCase()) {
    case 'open':
    case 'in progress':
      return chalk.yellow(state);
    case 'declined':
    case 'blocked':
      return chalk.red(state);
    case 'merged':
    case 'done':
    case 'resolved':
      return chalk.green(state);
    case 'in review':
    case 'review':
      return chalk.blue(state);
    case 'unknown':
      return chalk.gray(state);
    default:
      return state;
  }
}
