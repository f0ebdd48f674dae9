import { buildDependencyGraph, resolveDependencyClosure } from './dependency-graph.js';
import { getDefaultServices } from './manifest.js';
import { ValidationError } from './errors.js';
import { requireConfirmation, type Prompter } from './prompter.js';
import { silentLogger, type Logger } from './logger.js';
import type { ContainerRuntime } from './runtime.js';
import type {
  EnvironmentProfile,
  LifecycleIntent,
  LifecycleState,
  ServiceState,
  StackDescriptor,
  TransitionPlan,
  TransitionStep,
} from '../types/index.js';

export interface InferenceSettings {
  service: string;
  gpuService: string;
  profile: string;
  gpuAvailable: boolean;
}

export interface LifecycleCallbacks {
  onStateChange?: (state: LifecycleState) => void;
  onStepStart?: (step: TransitionStep) => void;
  onStepComplete?: (step: TransitionStep, durationMs: number) => void;
}

export interface TransitionResult {
  states: LifecycleState[];
  completedSteps: TransitionStep[];
  environment: EnvironmentProfile;
}

const LOG_TAIL_LINES = 50;

const unique = (names: readonly string[]): string[] => [...new Set(names)];

const chooseInferenceService = ({
  intent,
  inference,
}: {
  intent: LifecycleIntent;
  inference: InferenceSettings;
}): string | null => {
  if (!intent.withInference) return null;
  return intent.gpu && inference.gpuAvailable ? inference.gpuService : inference.service;
};

/**
 * Turn an intent into the ordered runtime steps. Pure: nothing is executed
 * and the runtime is not consulted.
 */
export const planTransition = ({
  intent,
  descriptor,
  inference,
}: {
  intent: LifecycleIntent;
  descriptor: StackDescriptor;
  inference: InferenceSettings;
}): TransitionPlan => {
  const unknown = intent.services.filter((name) => !descriptor.services.has(name));
  if (unknown.length > 0) {
    throw new ValidationError(
      `Unknown service(s): ${unknown.join(', ')}. ` +
        `Known services: ${[...descriptor.services.keys()].join(', ')}.`
    );
  }

  const inferenceService = chooseInferenceService({ intent, inference });
  if (inferenceService !== null && !descriptor.services.has(inferenceService)) {
    throw new ValidationError(
      `Inference service '${inferenceService}' is not defined in ${descriptor.manifestPath}.`
    );
  }

  const explicit = intent.services.length > 0;
  const baseServices = explicit ? [...intent.services] : getDefaultServices({ descriptor });
  const requested = unique([
    ...baseServices,
    ...(inferenceService === null ? [] : [inferenceService]),
  ]);
  const profiles = inferenceService === null ? [] : [inference.profile];

  const { graph } = buildDependencyGraph({ services: descriptor.services.values() });
  const closure = resolveDependencyClosure({ graph, serviceNames: requested });
  const buildable = closure.filter((name) => descriptor.services.get(name)?.hasBuild === true);

  const upSteps = (): TransitionStep[] => {
    if (intent.forceRecreate && explicit && !intent.recreateDependencies) {
      const named = new Set(requested);
      const dependencies = closure.filter((name) => !named.has(name));
      return [
        ...(dependencies.length > 0
          ? [{ kind: 'up' as const, services: dependencies, forceRecreate: false, noDeps: false }]
          : []),
        { kind: 'up', services: closure.filter((name) => named.has(name)), forceRecreate: true, noDeps: true },
      ];
    }
    return [{ kind: 'up', services: closure, forceRecreate: intent.forceRecreate, noDeps: false }];
  };

  const logSteps = (): TransitionStep[] =>
    intent.attached ? [{ kind: 'logs', services: closure }] : [];

  // Without a subset, down targets the whole project so its network goes too.
  const downStep: TransitionStep = {
    kind: 'down',
    services: explicit ? requested : [],
    removeVolumes: intent.clearVolumes,
  };

  const steps: TransitionStep[] = (() => {
    switch (intent.mode) {
      case 'build':
        return buildable.length > 0 ? [{ kind: 'build' as const, services: buildable }] : [];
      case 'up':
        return [
          ...(buildable.length > 0 ? [{ kind: 'ensure-images' as const, services: buildable }] : []),
          ...upSteps(),
          ...logSteps(),
        ];
      case 'both':
        return [
          ...(buildable.length > 0 ? [{ kind: 'build' as const, services: buildable }] : []),
          ...upSteps(),
          ...logSteps(),
        ];
      case 'down':
        return [downStep, ...upSteps(), ...logSteps()];
      case 'down_only':
        return [downStep];
    }
  })();

  return { steps, profiles, requestedServices: requested, inferenceService };
};

/**
 * Named volumes a volume-removing down would delete. With an explicit subset
 * these come from the manifest; otherwise from the runtime's project listing.
 */
export const listAffectedVolumes = async ({
  plan,
  descriptor,
  runtime,
  projectName,
}: {
  plan: TransitionPlan;
  descriptor: StackDescriptor;
  runtime: ContainerRuntime;
  projectName: string;
}): Promise<string[]> => {
  const down = plan.steps.find(
    (step): step is Extract<TransitionStep, { kind: 'down' }> =>
      step.kind === 'down' && step.removeVolumes
  );
  if (!down) return [];

  if (down.services.length === 0) {
    const volumes = await runtime.listResources('volume');
    return volumes.map((volume) => volume.name);
  }

  return unique(
    down.services.flatMap((serviceName) =>
      (descriptor.services.get(serviceName)?.namedVolumes ?? []).map(
        (volume) => `${projectName}_${volume}`
      )
    )
  );
};

/**
 * Execute a plan: confirm destructive steps, make sure the environment
 * profile exists, then run each step in order. The first failing step ends
 * the invocation; its error is rethrown after TERMINAL is reported.
 */
export const applyTransition = async ({
  intent,
  plan,
  descriptor,
  runtime,
  projectName,
  prepareEnvironment,
  prompter,
  logger = silentLogger,
  callbacks = {},
  signal,
}: {
  intent: LifecycleIntent;
  plan: TransitionPlan;
  descriptor: StackDescriptor;
  runtime: ContainerRuntime;
  projectName: string;
  prepareEnvironment: () => Promise<EnvironmentProfile>;
  prompter: Prompter;
  logger?: Logger;
  callbacks?: LifecycleCallbacks;
  signal?: AbortSignal;
}): Promise<TransitionResult> => {
  const states: LifecycleState[] = [];
  const completedSteps: TransitionStep[] = [];
  const enter = (state: LifecycleState): void => {
    states.push(state);
    callbacks.onStateChange?.(state);
  };

  enter('PARSED');
  if (intent.verbose) {
    const profiles = plan.profiles.length > 0 ? ` with profiles ${plan.profiles.join(', ')}` : '';
    logger.info(`Plan for ${intent.mode}${profiles}:`);
    plan.steps.forEach((step) => {
      logger.info(`  ${step.kind}: ${step.services.length > 0 ? step.services.join(', ') : 'all services'}`);
    });
  }

  try {
    if (intent.clearVolumes) {
      const volumes = await listAffectedVolumes({ plan, descriptor, runtime, projectName });
      if (volumes.length === 0) {
        logger.info('No named volumes to remove.');
      } else {
        logger.warn(`The following volumes will be removed:\n${volumes.map((v) => `  - ${v}`).join('\n')}`);
      }
      if (!intent.assumeYes) {
        await requireConfirmation({
          prompter,
          action: 'Volume removal',
          message: 'Remove these volumes? Their data cannot be recovered.',
        });
      }
    }

    const environment = await prepareEnvironment();
    enter('ENVIRONMENT_READY');

    for (const step of plan.steps) {
      const startedAt = Date.now();
      callbacks.onStepStart?.(step);
      await runStep({ step, runtime, profiles: plan.profiles, signal, logger });
      completedSteps.push(step);
      callbacks.onStepComplete?.(step, Date.now() - startedAt);
    }

    enter('TRANSITION_APPLIED');
    enter('TERMINAL');
    return { states, completedSteps, environment };
  } catch (error) {
    enter('TERMINAL');
    throw error;
  }
};

const runStep = async ({
  step,
  runtime,
  profiles,
  signal,
  logger,
}: {
  step: TransitionStep;
  runtime: ContainerRuntime;
  profiles: string[];
  signal?: AbortSignal;
  logger: Logger;
}): Promise<void> => {
  switch (step.kind) {
    case 'build':
      await runtime.build(step.services, { profiles });
      return;
    case 'ensure-images': {
      const missing = await runtime.missingImages(step.services);
      if (missing.length === 0) {
        logger.debug('All images present.');
        return;
      }
      logger.info(`Building missing images: ${missing.join(', ')}`);
      await runtime.build(missing, { profiles });
      return;
    }
    case 'up':
      await runtime.up(step.services, {
        detached: true,
        forceRecreate: step.forceRecreate,
        noDeps: step.noDeps,
        profiles,
      });
      return;
    case 'down':
      await runtime.down(step.services, {
        removeVolumes: step.removeVolumes,
        removeImages: false,
        profiles,
      });
      return;
    case 'logs':
      await runtime.logs(step.services, { follow: true, tail: LOG_TAIL_LINES, signal, profiles });
      return;
  }
};

/**
 * Plan and apply in one call. GPU support is only checked when the intent
 * asks for it; without it the CPU inference service is used.
 */
export const runLifecycle = async ({
  intent,
  descriptor,
  runtime,
  projectName,
  inference,
  prepareEnvironment,
  prompter,
  logger = silentLogger,
  callbacks,
  signal,
}: {
  intent: LifecycleIntent;
  descriptor: StackDescriptor;
  runtime: ContainerRuntime;
  projectName: string;
  inference: Omit<InferenceSettings, 'gpuAvailable'>;
  prepareEnvironment: () => Promise<EnvironmentProfile>;
  prompter: Prompter;
  logger?: Logger;
  callbacks?: LifecycleCallbacks;
  signal?: AbortSignal;
}): Promise<TransitionResult & { plan: TransitionPlan }> => {
  const gpuAvailable = intent.gpu ? await runtime.hasGpuSupport() : false;
  if (intent.gpu && !gpuAvailable) {
    logger.warn(`No GPU support detected; using '${inference.service}' instead of '${inference.gpuService}'.`);
  }

  const plan = planTransition({ intent, descriptor, inference: { ...inference, gpuAvailable } });
  const result = await applyTransition({
    intent,
    plan,
    descriptor,
    runtime,
    projectName,
    prepareEnvironment,
    prompter,
    logger,
    callbacks,
    signal,
  });
  return { ...result, plan };
};

/** Live state of every service in the manifest, in manifest order. */
export const getStackState = async ({
  descriptor,
  runtime,
}: {
  descriptor: StackDescriptor;
  runtime: ContainerRuntime;
}): Promise<ServiceState[]> => {
  const names = [...descriptor.services.keys()];
  const states = await runtime.status([]);
  const byName = new Map(states.map((state): [string, ServiceState] => [state.serviceName, state]));
  return names.map(
    (serviceName) =>
      byName.get(serviceName) ?? { serviceName, status: 'absent', containerId: null }
  );
};
