import chalk from 'chalk';
import {
  DEFAULT_CONFIG,
  ensureGitIgnore,
  getConfigPath,
  isInitialized,
  saveConfig,
} from '../../storage/index.js';
import { EXIT_CODES, type ExitCode } from '../../core/errors.js';
import { loadDescriptor, prepareProfile, type CommandContext } from '../context.js';

/**
 * Write stackctl.json when missing, scaffold the env profile and keep the
 * secret-bearing files out of git. Only key names are printed.
 */
export const initCommand = async ({
  context,
  regenerateEnv = false,
  assumeYes = false,
}: {
  context: CommandContext;
  regenerateEnv?: boolean;
  assumeYes?: boolean;
}): Promise<ExitCode> => {
  const { config, logger } = context;
  const cwd = config.projectDir;

  if (await isInitialized({ cwd })) {
    console.log(chalk.dim(`Using ${getConfigPath({ cwd })}`));
  } else {
    await saveConfig({ config: DEFAULT_CONFIG, cwd });
    logger.success(`Wrote ${getConfigPath({ cwd })}`);
  }

  const descriptor = await loadDescriptor(context);
  const profile = await prepareProfile({ context, descriptor, regenerateEnv, assumeYes });

  if (profile.written) {
    logger.success(`Env profile ready at ${chalk.cyan(profile.profilePath)}`);
  } else {
    console.log(chalk.dim(`${profile.profilePath} is already complete.`));
  }
  if (profile.generatedKeys.length > 0) {
    console.log(`Generated: ${profile.generatedKeys.map((key) => chalk.cyan(key)).join(', ')}`);
  }

  const added = await ensureGitIgnore({
    projectDir: cwd,
    entries: [config.envFile, config.credentialsFile, `${config.credentialsFile}.bak-*`],
  });
  if (added.length > 0) {
    logger.success(`Added to .gitignore: ${added.join(', ')}`);
  }

  console.log();
  console.log('Next steps:');
  console.log(`  ${chalk.cyan('stackctl --mode up')} - Start the stack`);
  console.log(`  ${chalk.cyan('stackctl --bootstrap-admin')} - Create the first administrator`);
  console.log(`  ${chalk.cyan('stackctl ls')} - Show services and their dependencies`);
  return EXIT_CODES.success;
};
