export type ActivityPhase = 'started' | 'completed' | 'failed';

export interface ActivityEntry {
  readonly integrationId: string;
  readonly action: string;
  readonly phase: ActivityPhase;
  readonly runId: string;
  readonly ts: Date;
  readonly payload: Record<string, unknown>;
}
