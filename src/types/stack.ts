export type DependencyCondition =
  | 'service_started'
  | 'service_healthy'
  | 'service_completed_successfully';

export interface ServiceDependency {
  service: string;
  condition: DependencyCondition;
}

export interface ServiceDefinition {
  serviceName: string;
  image: string | null;
  hasBuild: boolean;
  dependsOn: ServiceDependency[];
  profiles: string[];
  ports: string[];
  namedVolumes: string[];
  environment: Record<string, string>;
}

export interface StackDescriptor {
  manifestPath: string;
  services: Map<string, ServiceDefinition>;
  volumeNames: string[];
}
