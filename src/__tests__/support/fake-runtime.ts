import { buildDependencyGraph, resolveDependencyClosure } from '../../core/dependency-graph.js';
import { RuntimeTransitionError } from '../../core/errors.js';
import type {
  ContainerRuntime,
  DownOptions,
  LogsOptions,
  PruneScope,
  UpOptions,
} from '../../core/runtime.js';
import type {
  ResourceKind,
  ServiceState,
  StackDescriptor,
  StackResource,
} from '../../types/index.js';

export interface RuntimeCall {
  operation: 'build' | 'up' | 'down' | 'status' | 'prune' | 'logs' | 'missingImages';
  services: string[];
  options?: UpOptions | DownOptions | LogsOptions | { profiles: string[] } | { scope: PruneScope };
}

interface FakeContainer {
  id: string;
  serviceName: string;
}

/**
 * In-memory ContainerRuntime. Containers get a fresh id whenever they are
 * (re)created; volumes outside the project namespace are never touched.
 */
export class FakeRuntime implements ContainerRuntime {
  readonly calls: RuntimeCall[] = [];
  readonly containers = new Map<string, FakeContainer>();
  readonly volumes = new Set<string>();
  readonly foreignVolumes = new Set<string>();
  readonly networks = new Set<string>();
  readonly images = new Set<string>();
  gpu = false;
  failOn: RuntimeCall['operation'] | null = null;

  #nextId = 1;
  readonly #descriptor: StackDescriptor;
  readonly #projectName: string;

  constructor({ descriptor, projectName = 'test' }: { descriptor: StackDescriptor; projectName?: string }) {
    this.#descriptor = descriptor;
    this.#projectName = projectName;
  }

  /** Containers currently present, keyed by service. */
  containerIds(): Record<string, string> {
    return Object.fromEntries(
      [...this.containers.values()].map((container): [string, string] => [
        container.serviceName,
        container.id,
      ])
    );
  }

  #fail(operation: RuntimeCall['operation'], services: string[]): void {
    if (this.failOn === operation) {
      throw new RuntimeTransitionError({
        operation,
        services,
        runtimeExitCode: 1,
        stderr: `simulated ${operation} failure`,
      });
    }
  }

  #volumesOf(serviceName: string): string[] {
    return (this.#descriptor.services.get(serviceName)?.namedVolumes ?? []).map(
      (volume) => `${this.#projectName}_${volume}`
    );
  }

  build = async (services: string[], options: { profiles: string[] }): Promise<void> => {
    this.calls.push({ operation: 'build', services, options });
    this.#fail('build', services);
    services.forEach((service) => this.images.add(`${this.#projectName}-${service}`));
  };

  up = async (services: string[], options: UpOptions): Promise<void> => {
    this.calls.push({ operation: 'up', services, options });
    this.#fail('up', services);

    const { graph } = buildDependencyGraph({ services: this.#descriptor.services.values() });
    const targets = options.noDeps
      ? services
      : resolveDependencyClosure({ graph, serviceNames: services });

    this.networks.add(`${this.#projectName}_default`);
    targets.forEach((serviceName) => {
      const exists = this.containers.has(serviceName);
      const recreate = options.forceRecreate && services.includes(serviceName);
      if (!exists || recreate) {
        this.containers.set(serviceName, { id: `c${this.#nextId++}`, serviceName });
      }
      this.#volumesOf(serviceName).forEach((volume) => this.volumes.add(volume));
    });
  };

  down = async (services: string[], options: DownOptions): Promise<void> => {
    this.calls.push({ operation: 'down', services, options });
    this.#fail('down', services);

    const targets = services.length > 0 ? services : [...this.containers.keys()];
    targets.forEach((serviceName) => this.containers.delete(serviceName));

    if (services.length === 0) {
      this.networks.clear();
      if (options.removeVolumes) this.volumes.clear();
      if (options.removeImages) this.images.clear();
    } else if (options.removeVolumes) {
      targets.flatMap((serviceName) => this.#volumesOf(serviceName)).forEach((volume) => {
        this.volumes.delete(volume);
      });
    }
  };

  status = async (services: string[]): Promise<ServiceState[]> => {
    this.calls.push({ operation: 'status', services });
    const names = services.length > 0 ? services : [...this.containers.keys()];
    return names.map((serviceName): ServiceState => {
      const container = this.containers.get(serviceName);
      return {
        serviceName,
        status: container ? 'healthy' : 'absent',
        containerId: container?.id ?? null,
      };
    });
  };

  prune = async (scope: PruneScope): Promise<string[]> => {
    this.calls.push({ operation: 'prune', services: [], options: { scope } });
    const pool = { volumes: this.volumes, networks: this.networks, images: this.images }[scope];
    const removed = [...pool];
    pool.clear();
    return removed;
  };

  logs = async (services: string[], options: LogsOptions): Promise<void> => {
    this.calls.push({ operation: 'logs', services, options });
    const { signal } = options;
    if (!signal || signal.aborted) return;
    await new Promise<void>((resolve) => {
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  };

  listResources = async (kind: ResourceKind): Promise<StackResource[]> => {
    const names: Record<ResourceKind, string[]> = {
      container: [...this.containers.keys()].map((service) => `${this.#projectName}-${service}-1`),
      volume: [...this.volumes],
      network: [...this.networks],
      image: [...this.images],
    };
    return names[kind].map((name) => ({ kind, name }));
  };

  missingImages = async (services: string[]): Promise<string[]> => {
    this.calls.push({ operation: 'missingImages', services });
    return services.filter((service) => !this.images.has(`${this.#projectName}-${service}`));
  };

  hasGpuSupport = async (): Promise<boolean> => this.gpu;
}
