import { describe, expect, it } from 'vitest';
import {
  buildDependencyGraph,
  detectCycle,
  findRootServices,
  resolveDependencyClosure,
  topologicalSort,
} from '../dependency-graph.js';
import type { ServiceDefinition } from '../../types/index.js';

const service = (serviceName: string, dependsOn: string[] = []): ServiceDefinition => ({
  serviceName,
  image: null,
  hasBuild: false,
  dependsOn: dependsOn.map((name) => ({ service: name, condition: 'service_started' })),
  profiles: [],
  ports: [],
  namedVolumes: [],
  environment: {},
});

describe('dependency graph', () => {
  const services = [
    service('db'),
    service('cache'),
    service('worker', ['db']),
    service('api', ['db', 'worker', 'cache']),
    service('web', ['api']),
  ];

  it('orders dependencies before dependents, keeping declaration order on ties', () => {
    const { graph } = buildDependencyGraph({ services });
    expect(topologicalSort({ graph })).toEqual({
      sortedServices: ['db', 'cache', 'worker', 'api', 'web'],
      hasCycle: false,
    });
  });

  it('resolves the transitive closure in start order', () => {
    const { graph } = buildDependencyGraph({ services });
    expect(resolveDependencyClosure({ graph, serviceNames: ['api'] })).toEqual([
      'db',
      'cache',
      'worker',
      'api',
    ]);
    expect(resolveDependencyClosure({ graph, serviceNames: ['worker'] })).toEqual(['db', 'worker']);
  });

  it('reports edges to undeclared services', () => {
    const { danglingEdges } = buildDependencyGraph({
      services: [service('api', ['db', 'queue']), service('db')],
    });
    expect(danglingEdges).toEqual([['api', 'queue']]);
  });

  it('detects cycles and returns the cycle path', () => {
    const { graph } = buildDependencyGraph({
      services: [service('a', ['b']), service('b', ['c']), service('c', ['a'])],
    });
    expect(detectCycle({ graph })).toEqual({ hasCycle: true, cycleNodes: ['a', 'b', 'c', 'a'] });
    expect(topologicalSort({ graph }).hasCycle).toBe(true);
  });

  it('finds services without dependencies', () => {
    const { graph } = buildDependencyGraph({ services });
    expect(findRootServices({ graph })).toEqual(['db', 'cache']);
  });
});
