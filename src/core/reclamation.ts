import { requireTypedAcknowledgement, type Prompter } from './prompter.js';
import { silentLogger, type Logger } from './logger.js';
import type { ContainerRuntime, PruneScope } from './runtime.js';
import type { ResourceKind, StackResource } from '../types/index.js';

export const NUKE_PHRASE = 'confirm nuke';

export interface NukeResult {
  inventory: StackResource[];
  pruned: Record<PruneScope, string[]>;
}

const KIND_LABELS: Record<ResourceKind, string> = {
  container: 'Containers',
  volume: 'Volumes',
  network: 'Networks',
  image: 'Images',
};

/**
 * Tear down everything carrying the project label. The operator must type
 * the acknowledgement phrase; there is no flag that skips it.
 */
export const nuke = async ({
  runtime,
  prompter,
  includeImages = false,
  profiles = [],
  logger = silentLogger,
}: {
  runtime: ContainerRuntime;
  prompter: Prompter;
  includeImages?: boolean;
  profiles?: string[];
  logger?: Logger;
}): Promise<NukeResult> => {
  const kinds: ResourceKind[] = includeImages
    ? ['container', 'volume', 'network', 'image']
    : ['container', 'volume', 'network'];

  const inventory: StackResource[] = [];
  for (const kind of kinds) {
    inventory.push(...(await runtime.listResources(kind)));
  }

  logger.warn('This removes every project resource listed below:');
  kinds.forEach((kind) => {
    const names = inventory.filter((resource) => resource.kind === kind).map((r) => r.name);
    logger.info(`  ${KIND_LABELS[kind]}: ${names.length > 0 ? names.join(', ') : '(none)'}`);
  });

  await requireTypedAcknowledgement({ prompter, action: 'Nuke', phrase: NUKE_PHRASE });

  await runtime.down([], { removeVolumes: true, removeImages: includeImages, profiles });

  const pruned: Record<PruneScope, string[]> = {
    volumes: await runtime.prune('volumes'),
    networks: await runtime.prune('networks'),
    images: includeImages ? await runtime.prune('images') : [],
  };

  logger.debug(
    `Pruned ${pruned.volumes.length} volume(s), ${pruned.networks.length} network(s), ${pruned.images.length} image(s).`
  );

  return { inventory, pruned };
};
