import chalk from 'chalk';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Write everything to stderr, keeping stdout free for machine-readable output. */
  stderr?: boolean;
}

/**
 * Console logger used by the CLI. Debug lines only appear with `verbose`.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly options: ConsoleLoggerOptions = {}) {}

  debug(message: string, ...details: unknown[]): void {
    if (this.options.verbose) {
      this.write(chalk.gray(message), details);
    }
  }

  info(message: string, ...details: unknown[]): void {
    this.write(message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    console.warn(chalk.yellow(message), ...details);
  }

  error(message: string, ...details: unknown[]): void {
    console.error(chalk.red(message), ...details);
  }

  private write(message: string, details: unknown[]): void {
    if (this.options.stderr) {
      console.error(message, ...details);
    } else {
      console.log(message, ...details);
    }
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
