export const LIFECYCLE_MODES = ['build', 'up', 'down', 'both', 'down_only'] as const;

export type LifecycleMode = (typeof LIFECYCLE_MODES)[number];

export interface LifecycleIntent {
  readonly mode: LifecycleMode;
  readonly services: readonly string[];
  readonly forceRecreate: boolean;
  readonly recreateDependencies: boolean;
  readonly clearVolumes: boolean;
  readonly assumeYes: boolean;
  readonly attached: boolean;
  readonly withInference: boolean;
  readonly gpu: boolean;
  readonly verbose: boolean;
}

export type LifecycleState =
  | 'PARSED'
  | 'ENVIRONMENT_READY'
  | 'TRANSITION_APPLIED'
  | 'TERMINAL';

export type TransitionStep =
  | { kind: 'build'; services: string[] }
  | { kind: 'ensure-images'; services: string[] }
  | {
      kind: 'up';
      services: string[];
      forceRecreate: boolean;
      noDeps: boolean;
    }
  | { kind: 'down'; services: string[]; removeVolumes: boolean }
  | { kind: 'logs'; services: string[] };

export interface TransitionPlan {
  steps: TransitionStep[];
  profiles: string[];
  /** Services the operator asked for, before dependency expansion. */
  requestedServices: string[];
  /** Inference service chosen for this run, if any. */
  inferenceService: string | null;
}
