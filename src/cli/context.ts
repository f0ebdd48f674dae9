import { loadConfig, type ResolvedConfig } from '../storage/index.js';
import { createComposeRuntime, type ContainerRuntime } from '../core/runtime.js';
import { createInquirerPrompter, requireConfirmation, type Prompter } from '../core/prompter.js';
import { createLogger, type Logger } from '../core/logger.js';
import { loadManifest } from '../core/manifest.js';
import { ensureEnvironment } from '../core/scaffolder.js';
import { ConfigCorruptError } from '../core/errors.js';
import type { EnvironmentProfile, StackDescriptor } from '../types/index.js';

export interface CommandContext {
  config: ResolvedConfig;
  logger: Logger;
  runtime: ContainerRuntime;
  prompter: Prompter;
  env: NodeJS.ProcessEnv;
}

export const createContext = async ({
  cwd = process.cwd(),
  verbose = false,
  env = process.env,
}: {
  cwd?: string;
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
} = {}): Promise<CommandContext> => {
  const config = await loadConfig({ cwd, env });
  const logger = createLogger({ verbose });
  const runtime = createComposeRuntime({
    projectName: config.projectName,
    composePath: config.composePath,
    envPath: config.envPath,
    composeCommand: config.composeCommand,
    pullPolicy: config.pullPolicy,
    onCommand: (commandLine) => logger.debug(`$ ${commandLine}`),
  });
  return { config, logger, runtime, prompter: createInquirerPrompter(), env };
};

export const loadDescriptor = (context: CommandContext): Promise<StackDescriptor> =>
  loadManifest({ manifestPath: context.config.composePath });

/**
 * Ensure the env profile. A corrupt profile is only replaced when the
 * operator asked for it with --regenerate-env and then confirms (or --yes).
 */
export const prepareProfile = async ({
  context,
  descriptor,
  regenerateEnv = false,
  assumeYes = false,
}: {
  context: CommandContext;
  descriptor: StackDescriptor | null;
  regenerateEnv?: boolean;
  assumeYes?: boolean;
}): Promise<EnvironmentProfile> => {
  const ensure = (regenerateCorrupt: boolean): Promise<EnvironmentProfile> =>
    ensureEnvironment({
      profilePath: context.config.envPath,
      descriptor,
      regenerateCorrupt,
      env: context.env,
      logger: context.logger,
    });

  try {
    return await ensure(false);
  } catch (error) {
    if (!(error instanceof ConfigCorruptError) || !regenerateEnv) throw error;
    context.logger.warn(error.message);
    if (!assumeYes) {
      await requireConfirmation({
        prompter: context.prompter,
        action: 'Profile regeneration',
        message: `Move ${error.profilePath} aside and generate a new profile with fresh secrets?`,
      });
    }
    return ensure(true);
  }
};
