import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
  /** Printed only while verbose logging is enabled. */
  verbose(message: string): void;
}

/** Where log lines end up. `console` satisfies it. */
export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  /**
   * Evaluated on every verbose call. Must not load the configuration itself,
   * otherwise logging during a load would recurse.
   */
  isVerbose?: () => boolean;
  sink?: LogSink;
}

/** Console logger styled with chalk, matching the CLI's own output. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const isVerbose = options.isVerbose ?? (() => false);
  const sink = options.sink ?? console;

  return {
    info: (message) => sink.log(message),
    success: (message) => sink.log(chalk.green(`✓ ${message}`)),
    warn: (message) => sink.log(chalk.yellow(message)),
    error: (message, err) => {
      sink.error(chalk.red(message));
      if (err instanceof Error && err.stack && isVerbose()) sink.error(chalk.dim(err.stack));
    },
    verbose: (message) => {
      if (isVerbose()) sink.log(chalk.dim(message));
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
  verbose: () => {},
};
