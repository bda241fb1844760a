import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  // Keep stdout clean for machine-readable output
  stderrOnly?: boolean;
}

export function createConsoleLogger(options: LoggerOptions = {}): Logger {
  const out = (line: string) => {
    if (options.stderrOnly) {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug(message) {
      if (options.verbose) {
        out(chalk.gray(`     · ${message}`));
      }
    },
    info(message) {
      if (options.verbose) {
        out(chalk.cyan(`     ${message}`));
      }
    },
    warn(message) {
      console.error(chalk.yellow(`     ⚠ ${message}`));
    },
    error(message) {
      console.error(chalk.red(`     ✗ ${message}`));
    },
  };
}
