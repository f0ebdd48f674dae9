import chalk from 'chalk';
import ora from 'ora';
import { nuke } from '../../core/reclamation.js';
import { EXIT_CODES, type ExitCode } from '../../core/errors.js';
import type { CommandContext } from '../context.js';

export const nukeCommand = async ({
  includeImages = false,
  context,
}: {
  includeImages?: boolean;
  context: CommandContext;
}): Promise<ExitCode> => {
  const { config, runtime, prompter, logger } = context;
  console.log(chalk.bold.red(`Nuke project ${config.projectName}`));

  const { pruned } = await nuke({
    runtime: {
      ...runtime,
      down: async (services, downOptions) => {
        const spinner = ora('Tearing down the stack').start();
        try {
          await runtime.down(services, downOptions);
          spinner.succeed();
        } catch (error) {
          spinner.fail();
          throw error;
        }
      },
    },
    prompter,
    includeImages,
    profiles: [config.inferenceProfile],
    logger,
  });

  logger.success(
    `Removed ${pruned.volumes.length} volume(s), ${pruned.networks.length} network(s)` +
      (includeImages ? `, ${pruned.images.length} image(s)` : '') +
      '.'
  );
  return EXIT_CODES.success;
};
