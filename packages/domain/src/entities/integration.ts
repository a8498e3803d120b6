export type IntegrationActionId = 'auth' | 'pull_observations' | 'process_observations';

export interface IntegrationConfiguration {
  readonly action: IntegrationActionId;
  readonly data: Record<string, unknown>;
}

export interface Integration {
  readonly id: string;
  readonly name?: string;
  readonly configurations: readonly IntegrationConfiguration[];
}
