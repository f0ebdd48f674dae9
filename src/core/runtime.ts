import { spawn } from 'child_process';
import { describeError, RuntimeTransitionError } from './errors.js';
import type {
  ResourceKind,
  ServiceState,
  ServiceStatus,
  StackResource,
} from '../types/index.js';
import type { PullPolicy } from '../storage/config.js';

export interface UpOptions {
  detached: boolean;
  forceRecreate: boolean;
  noDeps: boolean;
  profiles: string[];
}

export interface DownOptions {
  removeVolumes: boolean;
  removeImages: boolean;
  profiles: string[];
}

export interface LogsOptions {
  follow: boolean;
  tail?: number;
  signal?: AbortSignal;
  profiles: string[];
}

export type PruneScope = 'volumes' | 'networks' | 'images';

/**
 * The container runtime as the lifecycle engine sees it. Implementations keep
 * no state between calls and never retry.
 */
export interface ContainerRuntime {
  build: (services: string[], options: { profiles: string[] }) => Promise<void>;
  up: (services: string[], options: UpOptions) => Promise<void>;
  down: (services: string[], options: DownOptions) => Promise<void>;
  status: (services: string[]) => Promise<ServiceState[]>;
  prune: (scope: PruneScope) => Promise<string[]>;
  logs: (services: string[], options: LogsOptions) => Promise<void>;
  listResources: (kind: ResourceKind) => Promise<StackResource[]>;
  missingImages: (services: string[]) => Promise<string[]>;
  hasGpuSupport: () => Promise<boolean>;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  aborted: boolean;
  spawnError: Error | null;
}

export interface CommandOptions {
  stream?: boolean;
  signal?: AbortSignal;
  onOutput?: (chunk: string) => void;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Run a command to completion. Never rejects: spawn failures and aborts are
 * reported in the result.
 */
export const spawnCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve) => {
    const stdoutChunks: string[] = [];
    const stderrChunks: string[] = [];

    const child = spawn(command, args, {
      stdio: options.stream ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      signal: options.signal,
    });

    child.stdout?.on('data', (data: Buffer) => {
      const text = data.toString();
      stdoutChunks.push(text);
      options.onOutput?.(text);
    });

    child.stderr?.on('data', (data: Buffer) => {
      const text = data.toString();
      stderrChunks.push(text);
      options.onOutput?.(text);
    });

    child.on('error', (error) => {
      resolve({
        exitCode: null,
        stdout: stdoutChunks.join(''),
        stderr: stderrChunks.join(''),
        aborted: error.name === 'AbortError',
        spawnError: error.name === 'AbortError' ? null : error,
      });
    });

    child.on('close', (code) => {
      resolve({
        exitCode: code,
        stdout: stdoutChunks.join(''),
        stderr: stderrChunks.join(''),
        aborted: options.signal?.aborted ?? false,
        spawnError: null,
      });
    });
  });

export interface ComposeRuntimeOptions {
  projectName: string;
  composePath: string;
  envPath: string;
  composeCommand: string[];
  pullPolicy: PullPolicy;
  dockerCommand?: string;
  run?: CommandRunner;
  onCommand?: (commandLine: string) => void;
  onOutput?: (chunk: string) => void;
}

export const PROJECT_LABEL = 'com.docker.compose.project';

export const buildComposeArgs = ({
  composeCommand,
  projectName,
  composePath,
  envPath,
  profiles = [],
}: {
  composeCommand: string[];
  projectName: string;
  composePath: string;
  envPath: string;
  profiles?: string[];
}): string[] => [
  ...composeCommand.slice(1),
  '-p',
  projectName,
  '-f',
  composePath,
  '--env-file',
  envPath,
  ...profiles.flatMap((profile) => ['--profile', profile]),
];

interface ComposePsEntry {
  ID?: string;
  Name?: string;
  Service?: string;
  State?: string;
  Health?: string;
  Image?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toPsEntry = (value: unknown): ComposePsEntry | null => {
  if (!isRecord(value)) return null;
  const field = (key: string): string | undefined => {
    const item = value[key];
    return typeof item === 'string' ? item : undefined;
  };
  return {
    ID: field('ID'),
    Name: field('Name'),
    Service: field('Service'),
    State: field('State'),
    Health: field('Health'),
    Image: field('Image'),
  };
};

/**
 * `compose ps --format json` prints a JSON array on older releases and one
 * object per line on newer ones.
 */
export const parseComposePs = (output: string): ComposePsEntry[] => {
  const trimmed = output.trim();
  if (trimmed === '') return [];

  const values: unknown[] = trimmed.startsWith('[')
    ? [JSON.parse(trimmed)].flat()
    : trimmed
        .split('\n')
        .filter((line) => line.trim() !== '')
        .map((line) => JSON.parse(line));

  return values
    .map(toPsEntry)
    .filter((entry): entry is ComposePsEntry => entry !== null);
};

const readOutput = <T>({
  operation,
  services,
  read,
}: {
  operation: string;
  services: string[];
  read: () => T;
}): T => {
  try {
    return read();
  } catch (error) {
    throw new RuntimeTransitionError({
      operation,
      services,
      runtimeExitCode: null,
      stderr: '',
      cause: new Error(`unreadable output (${describeError(error)})`, { cause: error }),
    });
  }
};

export const toServiceStatus = ({
  state,
  health,
}: {
  state?: string;
  health?: string;
}): ServiceStatus => {
  switch (state) {
    case 'running':
      if (health === 'healthy') return 'healthy';
      if (health === 'starting') return 'starting';
      if (health === 'unhealthy') return 'unhealthy';
      return 'running';
    case 'created':
    case 'restarting':
      return 'starting';
    case undefined:
      return 'absent';
    default:
      return 'stopped';
  }
};

/**
 * ContainerRuntime backed by the docker compose CLI.
 */
export const createComposeRuntime = ({
  projectName,
  composePath,
  envPath,
  composeCommand,
  pullPolicy,
  dockerCommand = 'docker',
  run = spawnCommand,
  onCommand,
  onOutput,
}: ComposeRuntimeOptions): ContainerRuntime => {
  const [composeBin] = composeCommand;
  const projectFilter = `label=${PROJECT_LABEL}=${projectName}`;

  const exec = async ({
    operation,
    services,
    command,
    args,
    stream = false,
    signal,
    allowFailure = false,
  }: {
    operation: string;
    services: string[];
    command: string;
    args: string[];
    stream?: boolean;
    signal?: AbortSignal;
    allowFailure?: boolean;
  }): Promise<CommandResult> => {
    onCommand?.([command, ...args].join(' '));
    const result = await run(command, args, { stream, signal, onOutput });

    if (result.aborted || allowFailure) {
      return result;
    }

    if (result.spawnError !== null || result.exitCode !== 0) {
      throw new RuntimeTransitionError({
        operation,
        services,
        runtimeExitCode: result.exitCode,
        stderr: result.stderr.trim(),
        cause: result.spawnError ?? undefined,
      });
    }

    return result;
  };

  const compose = ({
    operation,
    services,
    subcommand,
    profiles = [],
    stream,
    signal,
    allowFailure,
  }: {
    operation: string;
    services: string[];
    subcommand: string[];
    profiles?: string[];
    stream?: boolean;
    signal?: AbortSignal;
    allowFailure?: boolean;
  }): Promise<CommandResult> =>
    exec({
      operation,
      services,
      command: composeBin,
      args: [
        ...buildComposeArgs({ composeCommand, projectName, composePath, envPath, profiles }),
        ...subcommand,
      ],
      stream,
      signal,
      allowFailure,
    });

  const listResources = async (kind: ResourceKind): Promise<StackResource[]> => {
    const args: Record<ResourceKind, string[]> = {
      container: ['ps', '-a', '--filter', projectFilter, '--format', '{{.Names}}'],
      volume: ['volume', 'ls', '--filter', projectFilter, '--format', '{{.Name}}'],
      network: ['network', 'ls', '--filter', projectFilter, '--format', '{{.Name}}'],
      image: ['image', 'ls', '--filter', projectFilter, '--format', '{{.Repository}}:{{.Tag}}'],
    };
    const result = await exec({
      operation: `list ${kind}s`,
      services: [],
      command: dockerCommand,
      args: args[kind],
    });
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((name) => name !== '')
      .map((name) => ({ kind, name }));
  };

  const PRUNE_KIND: Record<PruneScope, ResourceKind> = {
    volumes: 'volume',
    networks: 'network',
    images: 'image',
  };

  return {
    build: async (services, { profiles }) => {
      await compose({ operation: 'build', services, subcommand: ['build', ...services], profiles });
    },

    up: async (services, { detached, forceRecreate, noDeps, profiles }) => {
      await compose({
        operation: 'up',
        services,
        profiles,
        stream: !detached,
        subcommand: [
          'up',
          ...(detached ? ['-d'] : []),
          ...(forceRecreate ? ['--force-recreate'] : []),
          ...(noDeps ? ['--no-deps'] : []),
          '--pull',
          pullPolicy,
          ...services,
        ],
      });
    },

    down: async (services, { removeVolumes, removeImages, profiles }) => {
      await compose({
        operation: 'down',
        services,
        profiles,
        subcommand: [
          'down',
          ...(removeVolumes ? ['--volumes'] : []),
          ...(removeImages ? ['--rmi', 'all'] : []),
          '--remove-orphans',
          ...services,
        ],
      });
    },

    status: async (services) => {
      const result = await compose({
        operation: 'status',
        services,
        subcommand: ['ps', '--all', '--format', 'json', ...services],
      });
      const entries = readOutput({
        operation: 'status',
        services,
        read: () => parseComposePs(result.stdout),
      });
      const byService = new Map(
        entries
          .filter((entry) => entry.Service !== undefined)
          .map((entry): [string, ComposePsEntry] => [entry.Service ?? '', entry])
      );
      const names = services.length > 0 ? services : [...byService.keys()];

      return names.map((serviceName) => {
        const entry = byService.get(serviceName);
        return {
          serviceName,
          status: toServiceStatus({ state: entry?.State, health: entry?.Health }),
          containerId: entry?.ID ?? null,
          containerName: entry?.Name ?? null,
          image: entry?.Image ?? null,
        };
      });
    },

    prune: async (scope) => {
      const kind = PRUNE_KIND[scope];
      const resources = await listResources(kind);
      if (resources.length === 0) return [];

      const names = resources.map((resource) => resource.name);
      await exec({
        operation: `prune ${scope}`,
        services: [],
        command: dockerCommand,
        args: [kind, 'rm', ...names],
      });
      return names;
    },

    logs: async (services, { follow, tail, signal, profiles }) => {
      await compose({
        operation: 'logs',
        services,
        profiles,
        stream: true,
        signal,
        subcommand: [
          'logs',
          ...(follow ? ['-f'] : []),
          ...(tail === undefined ? [] : [`--tail=${tail}`]),
          ...services,
        ],
      });
    },

    listResources,

    missingImages: async (services) => {
      const config = await compose({
        operation: 'inspect images',
        services,
        subcommand: ['config', '--format', 'json'],
      });
      const parsed: unknown = readOutput({
        operation: 'inspect images',
        services,
        read: () => JSON.parse(config.stdout),
      });
      const definitions = isRecord(parsed) && isRecord(parsed.services) ? parsed.services : {};

      const missing: string[] = [];
      for (const serviceName of services) {
        const definition = definitions[serviceName];
        if (!isRecord(definition) || definition.build === undefined) continue;
        const image =
          typeof definition.image === 'string'
            ? definition.image
            : `${projectName}-${serviceName}`;
        const inspect = await exec({
          operation: 'inspect images',
          services: [serviceName],
          command: dockerCommand,
          args: ['image', 'inspect', image],
          allowFailure: true,
        });
        if (inspect.exitCode !== 0) {
          missing.push(serviceName);
        }
      }
      return missing;
    },

    hasGpuSupport: async () => {
      const result = await run('nvidia-smi', [], {});
      return result.spawnError === null && result.exitCode === 0;
    },
  };
};
