export interface EnvironmentProfile {
  profilePath: string;
  values: Record<string, string>;
  /** Secret keys generated during this invocation (names only). */
  generatedKeys: string[];
  written: boolean;
}
