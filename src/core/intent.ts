import { ValidationError } from './errors.js';
import { LIFECYCLE_MODES, type LifecycleIntent, type LifecycleMode } from '../types/index.js';

export interface RawLifecycleOptions {
  mode?: string;
  services?: string[];
  forceRecreate?: boolean;
  recreateDeps?: boolean;
  clearVolumes?: boolean;
  yes?: boolean;
  attached?: boolean;
  withOllama?: boolean;
  ollamaGpu?: boolean;
  verbose?: boolean;
}

const SERVICE_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

const isLifecycleMode = (value: string): value is LifecycleMode =>
  LIFECYCLE_MODES.some((mode) => mode === value);

const STARTS_SERVICES: ReadonlySet<LifecycleMode> = new Set(['up', 'both', 'down']);

/**
 * Validate CLI options into an immutable intent. Without an explicit mode,
 * --clear-volumes means down_only; otherwise the mode defaults to up.
 */
export const parseIntent = ({
  options,
  recreateDependenciesDefault = false,
}: {
  options: RawLifecycleOptions;
  recreateDependenciesDefault?: boolean;
}): LifecycleIntent => {
  const requestedMode = options.mode?.replace('-', '_');
  const clearVolumes = options.clearVolumes ?? false;

  let mode: LifecycleMode;
  if (requestedMode === undefined) {
    mode = clearVolumes ? 'down_only' : 'up';
  } else if (isLifecycleMode(requestedMode)) {
    mode = requestedMode;
  } else {
    throw new ValidationError(
      `Unknown mode '${options.mode}'. Expected one of: ${LIFECYCLE_MODES.join(', ')}.`
    );
  }

  const services = (options.services ?? [])
    .flatMap((entry) => entry.split(','))
    .map((name) => name.trim())
    .filter((name) => name !== '');

  const invalid = services.filter((name) => !SERVICE_NAME.test(name));
  if (invalid.length > 0) {
    throw new ValidationError(`Invalid service name(s): ${invalid.join(', ')}.`);
  }

  if (clearVolumes && mode !== 'down' && mode !== 'down_only') {
    throw new ValidationError(`--clear-volumes cannot be combined with mode '${mode}'.`);
  }

  const forceRecreate = options.forceRecreate ?? false;
  const attached = options.attached ?? false;

  if (forceRecreate && !STARTS_SERVICES.has(mode)) {
    throw new ValidationError(`--force-recreate has no effect in mode '${mode}'.`);
  }

  if (attached && !STARTS_SERVICES.has(mode)) {
    throw new ValidationError(`--attached has no effect in mode '${mode}'.`);
  }

  const withInference = options.withOllama ?? false;
  const gpu = options.ollamaGpu ?? false;
  if (gpu && !withInference) {
    throw new ValidationError('--ollama-gpu requires --with-ollama.');
  }

  return Object.freeze({
    mode,
    services: Object.freeze([...new Set(services)]),
    forceRecreate,
    recreateDependencies: options.recreateDeps ?? recreateDependenciesDefault,
    clearVolumes,
    assumeYes: options.yes ?? false,
    attached,
    withInference,
    gpu,
    verbose: options.verbose ?? false,
  });
};
