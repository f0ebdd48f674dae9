import chalk from 'chalk';
import {
  EXIT_CODES,
  RuntimeTransitionError,
  StackctlError,
  describeError,
  type ExitCode,
} from '../core/errors.js';

const STDERR_TAIL_LINES = 20;

/**
 * Print a failure the way every command reports it and return the exit code.
 */
export const reportError = (
  error: unknown,
  print: (line: string) => void = (line) => console.error(line)
): ExitCode => {
  if (!(error instanceof StackctlError)) {
    print(chalk.red(`✗ Unexpected error: ${describeError(error)}`));
    if (error instanceof Error && error.stack) {
      print(chalk.dim(error.stack));
    }
    return EXIT_CODES.transitionFailed;
  }

  print(chalk.red(`✗ [${error.stage}] ${error.message}`));

  if (error instanceof RuntimeTransitionError && error.stderr !== '') {
    const tail = error.stderr.split('\n').slice(-STDERR_TAIL_LINES);
    print(chalk.dim('  runtime output:'));
    tail.forEach((line) => print(chalk.dim(`    ${line}`)));
  }

  return error.exitCode;
};
