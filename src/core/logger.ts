import chalk from 'chalk';

export interface Logger {
  info: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
  readonly verbose: boolean;
}

type Sink = (line: string) => void;

/**
 * Console logger with chalk styling. Debug lines only print when `verbose`.
 */
export const createLogger = ({
  verbose = false,
  out = (line) => console.log(line),
  err = (line) => console.error(line),
}: {
  verbose?: boolean;
  out?: Sink;
  err?: Sink;
} = {}): Logger => ({
  verbose,
  info: (message) => out(message),
  success: (message) => out(chalk.green(`✓ ${message}`)),
  warn: (message) => err(chalk.yellow(`! ${message}`)),
  error: (message) => err(chalk.red(`✗ ${message}`)),
  debug: (message) => {
    if (verbose) {
      out(chalk.dim(message));
    }
  },
});

export const silentLogger: Logger = createLogger({
  out: () => undefined,
  err: () => undefined,
});
