import chalk from 'chalk';
import { getStackState } from '../../core/lifecycle.js';
import { EXIT_CODES, type ExitCode } from '../../core/errors.js';
import { loadDescriptor, type CommandContext } from '../context.js';
import { STATUS_COLORS } from './ls.js';
import type { ServiceStatus } from '../../types/index.js';

const UP_STATUSES: ReadonlySet<ServiceStatus> = new Set(['running', 'healthy', 'starting']);

export const statusCommand = async ({
  context,
}: {
  context: CommandContext;
}): Promise<ExitCode> => {
  const descriptor = await loadDescriptor(context);
  const states = await getStackState({ descriptor, runtime: context.runtime });

  console.log(chalk.bold(`Stack: ${context.config.projectName}`));
  console.log();

  const width = Math.max(...states.map((state) => state.serviceName.length), 7);
  states.forEach((state) => {
    const colorFn = STATUS_COLORS[state.status];
    const container = state.containerName ?? (state.containerId ? state.containerId.slice(0, 12) : '');
    console.log(
      `${colorFn(`[${state.status.padEnd(9)}]`)} ${state.serviceName.padEnd(width)} ${chalk.dim(container)}`
    );
  });

  const up = states.filter((state) => UP_STATUSES.has(state.status)).length;
  const unhealthy = states.filter((state) => state.status === 'unhealthy').length;

  console.log();
  console.log(chalk.dim('─'.repeat(50)));
  console.log(
    `Total: ${states.length} services | ` +
      `${chalk.green(`${up} up`)} | ` +
      `${chalk.red(`${unhealthy} unhealthy`)} | ` +
      `${chalk.gray(`${states.length - up - unhealthy} down`)}`
  );
  return EXIT_CODES.success;
};
