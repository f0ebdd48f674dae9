import chalk from 'chalk';
import ora from 'ora';
import { parseIntent, type RawLifecycleOptions } from '../../core/intent.js';
import { runLifecycle } from '../../core/lifecycle.js';
import { EXIT_CODES, type ExitCode } from '../../core/errors.js';
import { loadDescriptor, prepareProfile, type CommandContext } from '../context.js';
import type { TransitionStep } from '../../types/index.js';

export interface LifecycleOptions extends RawLifecycleOptions {
  regenerateEnv?: boolean;
}

export const describeStep = (step: TransitionStep): string => {
  const target = step.services.length > 0 ? step.services.join(', ') : 'all services';
  switch (step.kind) {
    case 'build':
      return `Building ${target}`;
    case 'ensure-images':
      return `Checking images for ${target}`;
    case 'up': {
      const flags = [
        ...(step.forceRecreate ? ['recreate'] : []),
        ...(step.noDeps ? ['no deps'] : []),
      ];
      return `Starting ${target}${flags.length > 0 ? chalk.dim(` (${flags.join(', ')})`) : ''}`;
    }
    case 'down':
      return `Stopping ${target}${step.removeVolumes ? chalk.dim(' (removing volumes)') : ''}`;
    case 'logs':
      return `Following logs for ${target}`;
  }
};

export const formatDuration = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};

/**
 * Apply a lifecycle transition with a spinner per step. Attached runs stream
 * logs until Ctrl+C, which only stops the log stream.
 */
export const lifecycleCommand = async ({
  options,
  context,
}: {
  options: LifecycleOptions;
  context: CommandContext;
}): Promise<ExitCode> => {
  const { config, logger, runtime, prompter } = context;
  const intent = parseIntent({
    options,
    recreateDependenciesDefault: config.recreateDependencies,
  });
  const descriptor = await loadDescriptor(context);

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  if (intent.attached) {
    process.once('SIGINT', onInterrupt);
  }

  console.log(chalk.bold(`Stack ${config.projectName}: ${intent.mode.replace('_', ' ')}`));

  const spinner = ora({ spinner: 'dots' });

  try {
    const { plan, environment } = await runLifecycle({
      intent,
      descriptor,
      runtime,
      projectName: config.projectName,
      inference: {
        service: config.inferenceService,
        gpuService: config.gpuInferenceService,
        profile: config.inferenceProfile,
      },
      prepareEnvironment: () =>
        prepareProfile({
          context,
          descriptor,
          regenerateEnv: options.regenerateEnv,
          assumeYes: intent.assumeYes,
        }),
      prompter,
      logger,
      signal: controller.signal,
      callbacks: {
        onStateChange: (state) => logger.debug(`state: ${state}`),
        onStepStart: (step) => {
          if (step.kind === 'logs') {
            console.log(chalk.dim(`${describeStep(step)}. Press Ctrl+C to stop following.`));
            return;
          }
          spinner.start(describeStep(step));
        },
        onStepComplete: (step, durationMs) => {
          if (step.kind === 'logs') return;
          spinner.succeed(`${describeStep(step)} ${chalk.dim(`(${formatDuration(durationMs)})`)}`);
        },
      },
    });

    if (environment.generatedKeys.length > 0) {
      logger.info(chalk.dim(`Generated ${environment.generatedKeys.join(', ')} in ${environment.profilePath}`));
    }

    if (controller.signal.aborted) {
      logger.info(chalk.dim('Stopped following logs; containers keep running.'));
      return EXIT_CODES.interrupted;
    }

    if (plan.steps.length === 0) {
      logger.info(chalk.dim('Nothing to do.'));
    }
    logger.success(`Stack ${config.projectName} ${intent.mode.replace('_', ' ')} complete.`);
    return EXIT_CODES.success;
  } catch (error) {
    if (spinner.isSpinning) spinner.fail();
    throw error;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
};
