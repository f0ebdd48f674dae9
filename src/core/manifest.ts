import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ManifestError, describeError } from './errors.js';
import { buildDependencyGraph, detectCycle } from './dependency-graph.js';
import type {
  DependencyCondition,
  ServiceDefinition,
  StackDescriptor,
} from '../types/index.js';

const conditionSchema = z.enum([
  'service_started',
  'service_healthy',
  'service_completed_successfully',
]);

const dependsOnSchema = z.union([
  z.array(z.string()),
  z.record(
    z.string(),
    z.object({ condition: conditionSchema.optional() }).passthrough().nullable()
  ),
]);

const portSchema = z.union([
  z.string(),
  z.number(),
  z
    .object({
      target: z.union([z.number(), z.string()]),
      published: z.union([z.number(), z.string()]).optional(),
    })
    .passthrough(),
]);

const serviceVolumeSchema = z.union([
  z.string(),
  z.object({ type: z.string().optional(), source: z.string().optional() }).passthrough(),
]);

const serviceSchema = z
  .object({
    image: z.string().optional(),
    build: z.union([z.string(), z.record(z.string(), z.unknown())]).optional(),
    depends_on: dependsOnSchema.optional(),
    profiles: z.array(z.string()).optional(),
    ports: z.array(portSchema).optional(),
    volumes: z.array(serviceVolumeSchema).optional(),
    environment: z
      .union([
        z.array(z.string()),
        z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]).nullable()),
      ])
      .optional(),
  })
  .passthrough();

const manifestSchema = z
  .object({
    services: z.record(z.string(), serviceSchema.nullable()),
    volumes: z.record(z.string(), z.unknown()).nullable().optional(),
    networks: z.record(z.string(), z.unknown()).nullable().optional(),
  })
  .passthrough();

type RawService = z.infer<typeof serviceSchema>;

const normalizeDependsOn = (
  dependsOn: RawService['depends_on']
): ServiceDefinition['dependsOn'] => {
  if (!dependsOn) return [];
  if (Array.isArray(dependsOn)) {
    return dependsOn.map((service) => ({ service, condition: 'service_started' }));
  }
  return Object.entries(dependsOn).map(([service, options]) => ({
    service,
    condition: (options?.condition ?? 'service_started') satisfies DependencyCondition,
  }));
};

const normalizePort = (port: z.infer<typeof portSchema>): string => {
  if (typeof port === 'string') return port;
  if (typeof port === 'number') return String(port);
  return port.published === undefined
    ? String(port.target)
    : `${port.published}:${port.target}`;
};

const namedVolumeSource = (
  volume: z.infer<typeof serviceVolumeSchema>,
  declaredVolumes: Set<string>
): string | null => {
  const source =
    typeof volume === 'string' ? volume.split(':')[0] : volume.source ?? null;
  return source !== null && declaredVolumes.has(source) ? source : null;
};

const normalizeEnvironment = (
  environment: RawService['environment']
): Record<string, string> => {
  if (!environment) return {};
  if (Array.isArray(environment)) {
    return Object.fromEntries(
      environment
        .filter((entry) => entry.includes('='))
        .map((entry): [string, string] => {
          const separator = entry.indexOf('=');
          return [entry.slice(0, separator), entry.slice(separator + 1)];
        })
    );
  }
  return Object.fromEntries(
    Object.entries(environment)
      .filter((entry): entry is [string, string | number | boolean] => entry[1] !== null)
      .map(([key, value]): [string, string] => [key, String(value)])
  );
};

/**
 * Parse manifest text into a StackDescriptor and verify its dependency DAG.
 */
export const parseManifest = ({
  content,
  manifestPath,
}: {
  content: string;
  manifestPath: string;
}): StackDescriptor => {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new ManifestError(`'${manifestPath}' is not valid YAML: ${describeError(error)}`, {
      cause: error,
    });
  }

  const parsed = manifestSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ManifestError(`'${manifestPath}' is not a usable manifest: ${issues}`);
  }

  const volumeNames = Object.keys(parsed.data.volumes ?? {});
  const declaredVolumes = new Set(volumeNames);

  const services = new Map<string, ServiceDefinition>();
  Object.entries(parsed.data.services).forEach(([serviceName, raw]) => {
    const service: RawService = raw ?? {};
    services.set(serviceName, {
      serviceName,
      image: service.image ?? null,
      hasBuild: service.build !== undefined,
      dependsOn: normalizeDependsOn(service.depends_on),
      profiles: service.profiles ?? [],
      ports: (service.ports ?? []).map(normalizePort),
      namedVolumes: (service.volumes ?? [])
        .map((volume) => namedVolumeSource(volume, declaredVolumes))
        .filter((name): name is string => name !== null),
      environment: normalizeEnvironment(service.environment),
    });
  });

  const { graph, danglingEdges } = buildDependencyGraph({ services: services.values() });

  if (danglingEdges.length > 0) {
    const edges = danglingEdges.map(([from, to]) => `${from} -> ${to}`).join(', ');
    throw new ManifestError(`'${manifestPath}' depends on undeclared services: ${edges}`);
  }

  const { hasCycle, cycleNodes } = detectCycle({ graph });
  if (hasCycle) {
    throw new ManifestError(
      `'${manifestPath}' has a dependency cycle: ${cycleNodes.join(' -> ')}`
    );
  }

  return { manifestPath, services, volumeNames };
};

/**
 * Load and parse the manifest file
 */
export const loadManifest = async ({
  manifestPath,
}: {
  manifestPath: string;
}): Promise<StackDescriptor> => {
  let content: string;
  try {
    content = await readFile(manifestPath, 'utf-8');
  } catch (error) {
    throw new ManifestError(`Cannot read manifest '${manifestPath}': ${describeError(error)}`, {
      cause: error,
    });
  }
  return parseManifest({ content, manifestPath });
};

/**
 * Host port published for a container port of a service, if any.
 * Handles `host:container`, `ip:host:container` and `/proto` suffixes.
 */
export const findHostPort = ({
  descriptor,
  serviceName,
  containerPort,
}: {
  descriptor: StackDescriptor;
  serviceName: string;
  containerPort: string;
}): string | null => {
  const service = descriptor.services.get(serviceName);
  if (!service) return null;

  for (const mapping of service.ports) {
    const parts = mapping.split('/')[0].split(':');
    if (parts.length < 2) continue;
    const target = parts[parts.length - 1];
    const published = parts[parts.length - 2].trim();
    if (target === containerPort && published !== '') {
      return published;
    }
  }

  return null;
};

/**
 * Services that run without any profile enabled
 */
export const getDefaultServices = ({
  descriptor,
}: {
  descriptor: StackDescriptor;
}): string[] =>
  [...descriptor.services.values()]
    .filter((service) => service.profiles.length === 0)
    .map((service) => service.serviceName);
