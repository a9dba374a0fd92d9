/**
 * Logger utilities using chalk for colored output
 */

import chalk from 'chalk';

export interface LoggerOptions {
  verbose?: boolean;
  /** Suppress info and success messages; warnings and errors still print. */
  quiet?: boolean;
}

export class Logger {
  private readonly verbose: boolean;
  private readonly quiet: boolean;

  constructor(options: LoggerOptions | boolean = false) {
    const resolved = typeof options === 'boolean' ? { verbose: options } : options;
    this.verbose = resolved.verbose ?? false;
    this.quiet = resolved.quiet ?? false;
  }

  error(message: string, error?: Error): void {
    console.error(chalk.red(`✗ ${message}`));
    if (this.verbose && error) {
      console.error(chalk.gray(error.stack || error.message));
    }
  }

  success(message: string): void {
    if (this.quiet) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  info(message: string): void {
    if (this.quiet) return;
    console.log(chalk.blue(`ℹ ${message}`));
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`⚠ ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  log(message: string): void {
    console.log(message);
  }
}

// Default logger instance
export const logger = new Logger();

export function createLogger(options: LoggerOptions | boolean = false): Logger {
  return new Logger(options);
}
