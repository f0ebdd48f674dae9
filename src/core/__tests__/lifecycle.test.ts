import { beforeEach, describe, expect, it } from 'vitest';
import { applyTransition, getStackState, planTransition, runLifecycle } from '../lifecycle.js';
import { parseIntent, type RawLifecycleOptions } from '../intent.js';
import { ConfirmationDeclinedError, RuntimeTransitionError, ValidationError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { EnvironmentProfile, StackDescriptor } from '../../types/index.js';
import { FakeRuntime } from '../../__tests__/support/fake-runtime.js';
import { testDescriptor } from '../../__tests__/support/manifest.js';
import { scriptedPrompter, type ScriptedPrompter } from '../../__tests__/support/prompter.js';

const INFERENCE = { service: 'ollama', gpuService: 'ollama-gpu', profile: 'inference' };

const environment: EnvironmentProfile = {
  profilePath: '/project/.env',
  values: {},
  generatedKeys: [],
  written: false,
};

const intentOf = (options: RawLifecycleOptions) => parseIntent({ options });

const recordingLogger = (): Logger & { lines: string[] } => {
  const lines: string[] = [];
  return {
    lines,
    verbose: false,
    info: (message) => lines.push(`info: ${message}`),
    success: (message) => lines.push(`success: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
    debug: () => undefined,
  };
};

describe('planTransition', () => {
  const descriptor = testDescriptor();
  const plan = (options: RawLifecycleOptions, gpuAvailable = false) =>
    planTransition({ intent: intentOf(options), descriptor, inference: { ...INFERENCE, gpuAvailable } });

  it('starts every default service in dependency order', () => {
    expect(plan({})).toEqual({
      steps: [
        { kind: 'ensure-images', services: ['sandbox', 'api'] },
        {
          kind: 'up',
          services: ['db', 'qdrant', 'samba', 'sandbox', 'api'],
          forceRecreate: false,
          noDeps: false,
        },
      ],
      profiles: [],
      requestedServices: ['db', 'qdrant', 'sandbox', 'api', 'samba'],
      inferenceService: null,
    });
  });

  it('pulls in dependencies of a named subset and the inference profile', () => {
    const result = plan({ services: ['api'], withOllama: true });
    expect(result.steps).toEqual([
      { kind: 'ensure-images', services: ['sandbox', 'api'] },
      {
        kind: 'up',
        services: ['db', 'qdrant', 'ollama', 'sandbox', 'api'],
        forceRecreate: false,
        noDeps: false,
      },
    ]);
    expect(result.profiles).toEqual(['inference']);
    expect(result.inferenceService).toBe('ollama');
  });

  it('uses the GPU variant only when GPU support was detected', () => {
    expect(plan({ withOllama: true, ollamaGpu: true }, true).inferenceService).toBe('ollama-gpu');
    expect(plan({ withOllama: true, ollamaGpu: true }, false).inferenceService).toBe('ollama');
  });

  it('builds only services with a build context', () => {
    expect(plan({ mode: 'build' }).steps).toEqual([{ kind: 'build', services: ['sandbox', 'api'] }]);
    expect(plan({ mode: 'build', services: ['qdrant'] }).steps).toEqual([]);
  });

  it('always builds before starting in both mode', () => {
    expect(plan({ mode: 'both', services: ['sandbox'] }).steps).toEqual([
      { kind: 'build', services: ['sandbox'] },
      { kind: 'up', services: ['db', 'sandbox'], forceRecreate: false, noDeps: false },
    ]);
  });

  it('stops only the named services and leaves their dependencies alone', () => {
    expect(plan({ mode: 'down_only', services: ['api'] }).steps).toEqual([
      { kind: 'down', services: ['api'], removeVolumes: false },
    ]);
    expect(plan({ mode: 'down_only' }).steps).toEqual([
      { kind: 'down', services: [], removeVolumes: false },
    ]);
  });

  it('restarts in down mode', () => {
    expect(plan({ mode: 'down', services: ['api'] }).steps).toEqual([
      { kind: 'down', services: ['api'], removeVolumes: false },
      { kind: 'up', services: ['db', 'qdrant', 'sandbox', 'api'], forceRecreate: false, noDeps: false },
    ]);
  });

  it('recreates only the named services unless dependencies are requested too', () => {
    expect(plan({ services: ['api'], forceRecreate: true }).steps).toEqual([
      { kind: 'ensure-images', services: ['sandbox', 'api'] },
      { kind: 'up', services: ['db', 'qdrant', 'sandbox'], forceRecreate: false, noDeps: false },
      { kind: 'up', services: ['api'], forceRecreate: true, noDeps: true },
    ]);
    expect(plan({ services: ['api'], forceRecreate: true, recreateDeps: true }).steps).toEqual([
      { kind: 'ensure-images', services: ['sandbox', 'api'] },
      { kind: 'up', services: ['db', 'qdrant', 'sandbox', 'api'], forceRecreate: true, noDeps: false },
    ]);
  });

  it('follows logs after starting in attached mode', () => {
    expect(plan({ services: ['qdrant'], attached: true }).steps).toEqual([
      { kind: 'up', services: ['qdrant'], forceRecreate: false, noDeps: false },
      { kind: 'logs', services: ['qdrant'] },
    ]);
  });

  it('rejects services missing from the manifest', () => {
    expect(() => plan({ services: ['api', 'web'] })).toThrow(ValidationError);
    expect(() => plan({ services: ['api', 'web'] })).toThrow('Unknown service(s): web.');
  });
});

interface RunExtras {
  prompter?: ScriptedPrompter;
  logger?: Logger;
  signal?: AbortSignal;
  onLogs?: () => void;
}

describe('applying transitions', () => {
  let descriptor: StackDescriptor;
  let runtime: FakeRuntime;

  const run = (options: RawLifecycleOptions, extra: RunExtras = {}) =>
    runLifecycle({
      intent: intentOf(options),
      descriptor,
      runtime,
      projectName: 'test',
      inference: INFERENCE,
      prepareEnvironment: async () => environment,
      prompter: extra.prompter ?? scriptedPrompter({ interactive: false }),
      logger: extra.logger,
      signal: extra.signal,
      callbacks: {
        onStepStart: (step) => {
          if (step.kind === 'logs') extra.onLogs?.();
        },
      },
    });

  beforeEach(() => {
    descriptor = testDescriptor();
    runtime = new FakeRuntime({ descriptor });
  });

  it('walks the states in order and builds missing images once', async () => {
    const result = await run({});

    expect(result.states).toEqual(['PARSED', 'ENVIRONMENT_READY', 'TRANSITION_APPLIED', 'TERMINAL']);
    expect(runtime.calls.filter((call) => call.operation === 'build').map((call) => call.services)).toEqual([
      ['sandbox', 'api'],
    ]);

    await run({});
    expect(runtime.calls.filter((call) => call.operation === 'build')).toHaveLength(1);
  });

  it('removes only the named service and leaves the rest running', async () => {
    await run({});
    const before = runtime.containerIds();

    await run({ mode: 'down_only', services: ['qdrant'] });

    const states = await getStackState({ descriptor, runtime });
    expect(states.find((state) => state.serviceName === 'qdrant')?.status).toBe('absent');
    expect(runtime.containerIds()).toEqual(
      Object.fromEntries(Object.entries(before).filter(([service]) => service !== 'qdrant'))
    );
  });

  it('gives force-recreated services new containers', async () => {
    await run({});
    expect(runtime.containerIds()).toEqual({ db: 'c1', qdrant: 'c2', samba: 'c3', sandbox: 'c4', api: 'c5' });

    await run({ services: ['api'], forceRecreate: true });
    expect(runtime.containerIds()).toEqual({ db: 'c1', qdrant: 'c2', samba: 'c3', sandbox: 'c4', api: 'c6' });

    await run({ services: ['api'], forceRecreate: true, recreateDeps: true });
    expect(runtime.containerIds()).toEqual({ db: 'c7', qdrant: 'c8', samba: 'c3', sandbox: 'c9', api: 'c10' });
  });

  it('refuses to clear volumes without a terminal and touches nothing', async () => {
    await run({});
    runtime.calls.length = 0;
    let prepared = false;

    const attempt = applyTransition({
      intent: intentOf({ clearVolumes: true }),
      plan: planTransition({
        intent: intentOf({ clearVolumes: true }),
        descriptor,
        inference: { ...INFERENCE, gpuAvailable: false },
      }),
      descriptor,
      runtime,
      projectName: 'test',
      prepareEnvironment: async () => {
        prepared = true;
        return environment;
      },
      prompter: scriptedPrompter({ interactive: false }),
    });

    await expect(attempt).rejects.toBeInstanceOf(ConfirmationDeclinedError);
    expect(prepared).toBe(false);
    expect(runtime.calls).toEqual([]);
    expect([...runtime.volumes]).toEqual(['test_db_data', 'test_vector_data']);
  });

  it('lists the volumes, asks, and keeps volumes outside the project', async () => {
    await run({});
    runtime.foreignVolumes.add('other_data');
    const prompter = scriptedPrompter({ confirms: [true] });
    const logger = recordingLogger();

    await run({ clearVolumes: true }, { prompter, logger });

    expect(logger.lines).toEqual([
      'warn: The following volumes will be removed:\n  - test_db_data\n  - test_vector_data',
    ]);
    expect(prompter.asked).toEqual(['Remove these volumes? Their data cannot be recovered.']);
    expect([...runtime.volumes]).toEqual([]);
    expect([...runtime.foreignVolumes]).toEqual(['other_data']);
    expect(runtime.containerIds()).toEqual({});
  });

  it('skips the question with --yes and scopes volumes to the named services', async () => {
    await run({});
    const prompter = scriptedPrompter();
    const logger = recordingLogger();

    await run({ clearVolumes: true, yes: true, services: ['db'] }, { prompter, logger });

    expect(prompter.asked).toEqual([]);
    expect(logger.lines).toEqual(['warn: The following volumes will be removed:\n  - test_db_data']);
    expect([...runtime.volumes]).toEqual(['test_vector_data']);
  });

  it('stops at the first failing step', async () => {
    runtime.failOn = 'up';
    const states: string[] = [];

    const attempt = runLifecycle({
      intent: intentOf({}),
      descriptor,
      runtime,
      projectName: 'test',
      inference: INFERENCE,
      prepareEnvironment: async () => environment,
      prompter: scriptedPrompter(),
      callbacks: { onStateChange: (state) => states.push(state) },
    });

    await expect(attempt).rejects.toBeInstanceOf(RuntimeTransitionError);
    expect(states).toEqual(['PARSED', 'ENVIRONMENT_READY', 'TERMINAL']);
    expect(runtime.containerIds()).toEqual({});
  });

  it('returns when the log stream is interrupted and leaves containers running', async () => {
    const controller = new AbortController();

    const result = await run(
      { services: ['qdrant'], attached: true },
      { signal: controller.signal, onLogs: () => setTimeout(() => controller.abort(), 0) }
    );

    expect(result.completedSteps.map((step) => step.kind)).toEqual(['up', 'logs']);
    expect(runtime.containerIds()).toEqual({ qdrant: 'c1' });
  });

  it('logs the plan before applying it when verbose', async () => {
    const logger = recordingLogger();

    await run({ services: ['qdrant'], verbose: true }, { logger });
    expect(logger.lines).toEqual(['info: Plan for up:', 'info:   up: qdrant']);

    logger.lines.length = 0;
    await run({ services: ['qdrant'] }, { logger });
    expect(logger.lines).toEqual([]);
  });

  it('falls back to the CPU inference service without GPU support', async () => {
    const logger = recordingLogger();

    const result = await run({ withOllama: true, ollamaGpu: true, services: ['samba'] }, { logger });

    expect(result.plan.inferenceService).toBe('ollama');
    expect(logger.lines).toEqual([
      "warn: No GPU support detected; using 'ollama' instead of 'ollama-gpu'.",
    ]);

    runtime.gpu = true;
    const withGpu = await run({ withOllama: true, ollamaGpu: true, services: ['samba'] });
    expect(withGpu.plan.inferenceService).toBe('ollama-gpu');
  });

  it('reports every manifest service, absent ones included', async () => {
    await run({ services: ['qdrant'] });

    const states = await getStackState({ descriptor, runtime });
    expect(states.map((state) => [state.serviceName, state.status])).toEqual([
      ['db', 'absent'],
      ['qdrant', 'healthy'],
      ['sandbox', 'absent'],
      ['api', 'absent'],
      ['samba', 'absent'],
      ['ollama', 'absent'],
      ['ollama-gpu', 'absent'],
    ]);
  });
});
