export type ServiceStatus =
  | 'absent'
  | 'starting'
  | 'running'
  | 'healthy'
  | 'unhealthy'
  | 'stopped';

export interface ServiceState {
  serviceName: string;
  status: ServiceStatus;
  containerId: string | null;
  containerName?: string | null;
  image?: string | null;
}

export type ResourceKind = 'container' | 'volume' | 'network' | 'image';

export interface StackResource {
  kind: ResourceKind;
  name: string;
}
