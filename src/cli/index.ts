import { Command, Option } from 'commander';
import {
  bootstrapCommand,
  initCommand,
  lifecycleCommand,
  lsCommand,
  nukeCommand,
  statusCommand,
  validateBootstrapOptions,
  wantsBootstrap,
  type BootstrapOptions,
  type LifecycleOptions,
} from './commands/index.js';
import { createContext, type CommandContext } from './context.js';
import { reportError } from './report-error.js';
import { EXIT_CODES, ValidationError, type ExitCode } from '../core/errors.js';
import { LIFECYCLE_MODES } from '../types/index.js';

interface RootOptions extends LifecycleOptions, BootstrapOptions {
  nuke?: boolean;
  includeImages?: boolean;
}

/**
 * Build a context, run the action and turn its outcome into process.exitCode.
 */
const withContext =
  <T extends unknown[]>(
    action: (context: CommandContext, ...args: T) => Promise<ExitCode>,
    { verbose }: { verbose?: (...args: T) => boolean } = {}
  ) =>
  async (...args: T): Promise<void> => {
    try {
      const context = await createContext({ verbose: verbose?.(...args) ?? false });
      process.exitCode = await action(context, ...args);
    } catch (error) {
      process.exitCode = reportError(error);
    }
  };

/**
 * Without subcommand: nuke when asked; otherwise the lifecycle transition
 * (skipped when only bootstrap stages were requested without --mode), then
 * the bootstrap stages in order.
 */
const rootAction = async (context: CommandContext, options: RootOptions): Promise<ExitCode> => {
  if (options.nuke) {
    if (options.mode !== undefined || wantsBootstrap(options)) {
      throw new ValidationError('--nuke cannot be combined with --mode or bootstrap stages.');
    }
    return nukeCommand({ includeImages: options.includeImages, context });
  }
  if (options.includeImages) {
    throw new ValidationError('--include-images only applies to --nuke.');
  }

  const bootstrap = wantsBootstrap(options);
  if (bootstrap) {
    validateBootstrapOptions(options);
  }
  if (!bootstrap || options.mode !== undefined || options.clearVolumes) {
    const code = await lifecycleCommand({ options, context });
    if (code !== EXIT_CODES.success) return code;
  }

  return bootstrap ? bootstrapCommand({ options, context }) : EXIT_CODES.success;
};

const program = new Command();

program
  .name('stackctl')
  .description('Lifecycle orchestrator for a docker compose stack')
  .version('1.0.0')
  .addOption(new Option('-m, --mode <mode>', 'Lifecycle mode').choices([...LIFECYCLE_MODES]))
  .option('-s, --services <names...>', 'Restrict to these services (and their dependencies)')
  .option('--with-ollama', 'Include the inference service')
  .option('--ollama-gpu', 'Use the GPU inference variant when GPU support is available')
  .option('--clear-volumes', 'Remove named volumes on down (asks for confirmation)')
  .option('-y, --yes', 'Confirm volume removal and profile regeneration without asking')
  .option('--force-recreate', 'Recreate containers even if unchanged')
  .option('--recreate-deps', 'With --force-recreate and --services, also recreate dependencies')
  .option('-a, --attached', 'Follow logs after starting (Ctrl+C stops following)')
  .option('-v, --verbose', 'Print runtime commands and debug output')
  .option('--nuke', 'Remove every container, volume and network of the project')
  .option('--include-images', 'With --nuke, also remove the project images')
  .option('--regenerate-env', 'Replace an unreadable env profile after confirmation')
  .option('--bootstrap-admin', 'Create the first administrator and save its key')
  .option('--bootstrap-db-url <url>', 'Database URL for the administrator bootstrap')
  .option('--admin-email <email>', 'Administrator email')
  .option('--admin-name <name>', 'Administrator full name')
  .option('--create-user', 'Create a regular user and issue its key')
  .option('--user-name <name>', 'Full name of the user to create')
  .option('--user-email <email>', 'Email of the user to create')
  .option('--setup-assistant', 'Provision the default assistant for a user')
  .option('--exec-api-key <key>', 'Administrator key for user and assistant stages')
  .option('--exec-user-id <id>', 'User id for the assistant stage')
  .option('--base-url <url>', 'API base URL (overrides stackctl.json)')
  .action(
    withContext((context, options: RootOptions) => rootAction(context, options), {
      verbose: (options) => options.verbose ?? false,
    })
  );

program
  .command('init')
  .description('Write stackctl.json and scaffold the env profile')
  .option('--regenerate-env', 'Replace an unreadable env profile after confirmation')
  .option('-y, --yes', 'Do not ask before replacing an unreadable profile')
  .option('-v, --verbose', 'Print debug output')
  .action(
    withContext(
      (context, options: { regenerateEnv?: boolean; yes?: boolean; verbose?: boolean }) =>
        initCommand({ context, regenerateEnv: options.regenerateEnv, assumeYes: options.yes }),
      { verbose: (options) => options.verbose ?? false }
    )
  );

program
  .command('ls')
  .description('Show services as a dependency tree with live status')
  .action(withContext((context) => lsCommand({ context })));

program
  .command('status')
  .description('Show the state of every service')
  .action(withContext((context) => statusCommand({ context })));

export const run = async (argv: string[] = process.argv): Promise<void> => {
  await program.parseAsync(argv);
};

export { program, rootAction };
