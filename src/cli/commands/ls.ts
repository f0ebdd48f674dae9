import chalk from 'chalk';
import {
  buildDependencyGraph,
  findRootServices,
  type DependencyGraph,
} from '../../core/dependency-graph.js';
import { getStackState } from '../../core/lifecycle.js';
import { EXIT_CODES, type ExitCode } from '../../core/errors.js';
import { loadDescriptor, type CommandContext } from '../context.js';
import type { ServiceStatus, StackDescriptor } from '../../types/index.js';

export const STATUS_ICONS: Record<ServiceStatus, string> = {
  absent: '◯',
  starting: '◉',
  running: '●',
  healthy: '●',
  unhealthy: '✗',
  stopped: '○',
};

export const STATUS_COLORS: Record<ServiceStatus, (text: string) => string> = {
  absent: chalk.gray,
  starting: chalk.yellow,
  running: chalk.cyan,
  healthy: chalk.green,
  unhealthy: chalk.red,
  stopped: chalk.dim,
};

interface TreeNode {
  serviceName: string;
  status: ServiceStatus;
  profiles: string[];
  children: TreeNode[];
}

const MAX_TREE_DEPTH = 10;

/**
 * Roots are services with no dependencies; each node lists its dependents
 * beneath it. A service shown once is not expanded again.
 */
const buildTree = ({
  graph,
  descriptor,
  statuses,
}: {
  graph: DependencyGraph;
  descriptor: StackDescriptor;
  statuses: Map<string, ServiceStatus>;
}): TreeNode[] => {
  const expanded = new Set<string>();

  const buildNode = (serviceName: string, depth: number): TreeNode => {
    const node: TreeNode = {
      serviceName,
      status: statuses.get(serviceName) ?? 'absent',
      profiles: descriptor.services.get(serviceName)?.profiles ?? [],
      children: [],
    };
    if (expanded.has(serviceName) || depth >= MAX_TREE_DEPTH) return node;
    expanded.add(serviceName);
    node.children = (graph.get(serviceName)?.dependents ?? []).map((dependent) =>
      buildNode(dependent, depth + 1)
    );
    return node;
  };

  return findRootServices({ graph }).map((name) => buildNode(name, 0));
};

export const renderTree = ({
  nodes,
  prefix = '',
}: {
  nodes: TreeNode[];
  prefix?: string;
}): string[] =>
  nodes.flatMap((node, index) => {
    const isLast = index === nodes.length - 1;
    const connector = prefix === '' ? '' : isLast ? '└─ ' : '├─ ';
    const colorFn = STATUS_COLORS[node.status];
    const profiles = node.profiles.length > 0 ? chalk.dim(` [${node.profiles.join(', ')}]`) : '';
    const line = `${prefix}${connector}${colorFn(STATUS_ICONS[node.status])} ${node.serviceName}${profiles}`;
    const childPrefix = prefix === '' ? '  ' : prefix + (isLast ? '   ' : '│  ');
    return [line, ...renderTree({ nodes: node.children, prefix: childPrefix })];
  });

/**
 * Show the manifest's services as a dependency tree with live status.
 */
export const lsCommand = async ({ context }: { context: CommandContext }): Promise<ExitCode> => {
  const descriptor = await loadDescriptor(context);
  const { graph } = buildDependencyGraph({ services: descriptor.services.values() });
  const states = await getStackState({ descriptor, runtime: context.runtime });
  const statuses = new Map(
    states.map((state): [string, ServiceStatus] => [state.serviceName, state.status])
  );

  console.log(chalk.bold(`Stack: ${context.config.projectName}`));
  console.log(chalk.dim(descriptor.manifestPath));
  console.log();

  renderTree({ nodes: buildTree({ graph, descriptor, statuses }) }).forEach((line) =>
    console.log(line)
  );

  console.log();
  console.log(chalk.dim('Legend:'));
  console.log(
    (['absent', 'starting', 'running', 'healthy', 'unhealthy', 'stopped'] as const)
      .map((status) => `${STATUS_COLORS[status](STATUS_ICONS[status])} ${status}`)
      .join('  ')
      .replace(/^/, '  ')
  );
  return EXIT_CODES.success;
};
