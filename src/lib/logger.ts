/**
 * Console logger with chalk colouring
 */

import chalk from 'chalk';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  success(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

function withData(message: string, data?: LogData): string {
  if (!data || Object.keys(data).length === 0) {
    return message;
  }
  return `${message} ${chalk.gray(JSON.stringify(data))}`;
}

export class ConsoleLogger implements Logger {
  private verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  debug(message: string, data?: LogData): void {
    if (this.verbose) {
      console.log(chalk.gray(withData(message, data)));
    }
  }

  info(message: string, data?: LogData): void {
    console.log(withData(message, data));
  }

  success(message: string, data?: LogData): void {
    console.log(chalk.green(`✓ ${withData(message, data)}`));
  }

  warn(message: string, data?: LogData): void {
    console.warn(chalk.yellow(`⚠ ${withData(message, data)}`));
  }

  error(message: string, data?: LogData): void {
    console.error(chalk.red(`✗ ${withData(message, data)}`));
  }
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
};
