import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

// stdout carries the report; everything else goes to stderr.
export function createLogger(opts: LoggerOptions = {}): Logger {
  return {
    debug(message) {
      if (opts.verbose) console.error(chalk.dim(`debug: ${message}`));
    },
    info(message) {
      console.log(message);
    },
    warn(message) {
      console.error(chalk.yellow(message));
    },
    error(message) {
      console.error(chalk.red(message));
    },
  };
}
