import type { ServiceDefinition } from '../types/index.js';

export interface DependencyNode {
  serviceName: string;
  dependsOn: string[];
  dependents: string[];
}

export type DependencyGraph = Map<string, DependencyNode>;

interface TopologicalSortResult {
  sortedServices: string[];
  hasCycle: boolean;
  cycleNodes?: string[];
}

/**
 * Build a dependency graph from service definitions. Edges pointing at
 * services that are not declared are reported separately rather than dropped.
 */
export const buildDependencyGraph = ({
  services,
}: {
  services: Iterable<ServiceDefinition>;
}): { graph: DependencyGraph; danglingEdges: Array<[string, string]> } => {
  const graph: DependencyGraph = new Map();
  const definitions = [...services];
  const danglingEdges: Array<[string, string]> = [];

  definitions.forEach((service) => {
    graph.set(service.serviceName, {
      serviceName: service.serviceName,
      dependsOn: [],
      dependents: [],
    });
  });

  definitions.forEach((service) => {
    const node = graph.get(service.serviceName);
    if (!node) return;

    service.dependsOn.forEach(({ service: dependency }) => {
      const dependencyNode = graph.get(dependency);
      if (!dependencyNode) {
        danglingEdges.push([service.serviceName, dependency]);
        return;
      }
      node.dependsOn.push(dependency);
      dependencyNode.dependents.push(service.serviceName);
    });
  });

  return { graph, danglingEdges };
};

/**
 * Detect cycles using DFS with an explicit path stack
 */
export const detectCycle = ({
  graph,
}: {
  graph: DependencyGraph;
}): { hasCycle: boolean; cycleNodes: string[] } => {
  const finished = new Set<string>();
  const path: string[] = [];
  const onPath = new Set<string>();
  let cycleNodes: string[] = [];

  const visit = (serviceName: string): boolean => {
    path.push(serviceName);
    onPath.add(serviceName);

    for (const dependency of graph.get(serviceName)?.dependsOn ?? []) {
      if (onPath.has(dependency)) {
        cycleNodes = [...path.slice(path.indexOf(dependency)), dependency];
        return true;
      }
      if (!finished.has(dependency) && visit(dependency)) {
        return true;
      }
    }

    path.pop();
    onPath.delete(serviceName);
    finished.add(serviceName);
    return false;
  };

  for (const serviceName of graph.keys()) {
    if (!finished.has(serviceName) && visit(serviceName)) {
      return { hasCycle: true, cycleNodes };
    }
  }

  return { hasCycle: false, cycleNodes: [] };
};

/**
 * Kahn's algorithm; dependencies come before their dependents. Ties keep
 * declaration order so the output is stable.
 */
export const topologicalSort = ({
  graph,
}: {
  graph: DependencyGraph;
}): TopologicalSortResult => {
  const cycleResult = detectCycle({ graph });
  if (cycleResult.hasCycle) {
    return {
      sortedServices: [],
      hasCycle: true,
      cycleNodes: cycleResult.cycleNodes,
    };
  }

  const inDegree = new Map<string, number>();
  graph.forEach((node) => inDegree.set(node.serviceName, node.dependsOn.length));

  const queue = [...graph.keys()].filter((name) => inDegree.get(name) === 0);
  const sortedServices: string[] = [];

  while (queue.length > 0) {
    const serviceName = queue.shift();
    if (serviceName === undefined) continue;

    sortedServices.push(serviceName);

    graph.get(serviceName)?.dependents.forEach((dependent) => {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) {
        queue.push(dependent);
      }
    });
  }

  return { sortedServices, hasCycle: false };
};

/**
 * The named services plus everything they transitively depend on, in
 * start order.
 */
export const resolveDependencyClosure = ({
  graph,
  serviceNames,
}: {
  graph: DependencyGraph;
  serviceNames: readonly string[];
}): string[] => {
  const included = new Set<string>();
  const pending = [...serviceNames];

  while (pending.length > 0) {
    const serviceName = pending.pop();
    if (serviceName === undefined || included.has(serviceName)) continue;
    included.add(serviceName);
    pending.push(...(graph.get(serviceName)?.dependsOn ?? []));
  }

  const { sortedServices } = topologicalSort({ graph });
  return sortedServices.filter((name) => included.has(name));
};

/**
 * Services with no dependencies of their own
 */
export const findRootServices = ({ graph }: { graph: DependencyGraph }): string[] =>
  [...graph.values()]
    .filter((node) => node.dependsOn.length === 0)
    .map((node) => node.serviceName);
