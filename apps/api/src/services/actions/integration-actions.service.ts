import { IntegrationNotFoundError } from '@wildlife-telemetry/domain';
import type {
  ActivityLogPort,
  BlobStoragePort,
  FileActionInput,
  FileStatusResult,
  GroupStorePort,
  Integration,
  IntegrationActionsPort,
  IntegrationRepositoryPort,
  ProcessObservationsInput,
  ProcessObservationsResult,
  PullObservationsResult,
  SetFileStatusInput,
} from '@wildlife-telemetry/domain';
import { systemClock } from '@wildlife-telemetry/adapters';
import type { Clock } from '@wildlife-telemetry/adapters';
import { withActivityLog } from '../activity/activity-logger.js';
import { FileStateMachine } from '../staging/file-state-machine.js';
import { KeyedMutex } from '../staging/keyed-mutex.js';
import type { IngestionPipeline } from '../pipeline/ingestion-pipeline.js';

export interface IntegrationActionsDeps {
  integrations: IntegrationRepositoryPort;
  groups: GroupStorePort;
  blobs: BlobStoragePort;
  activityLog: ActivityLogPort;
  pipeline: IngestionPipeline;
  /** Shared by every state machine this service creates, so per-file locks hold across requests. */
  mutex?: KeyedMutex;
  clock?: Clock;
}

export class IntegrationActionsService implements IntegrationActionsPort {
  private readonly mutex: KeyedMutex;
  private readonly clock: Clock;

  constructor(private readonly deps: IntegrationActionsDeps) {
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.clock = deps.clock ?? systemClock;
  }

  private async loadIntegration(integrationId: string): Promise<Integration> {
    const integration = await this.deps.integrations.findById(integrationId);
    if (!integration) throw new IntegrationNotFoundError(integrationId);
    return integration;
  }

  private stateMachineFor(integrationId: string): FileStateMachine {
    return new FileStateMachine(integrationId, this.deps.groups, this.deps.blobs, this.mutex);
  }

  private logged<T>(
    integrationId: string,
    action: string,
    input: Record<string, unknown>,
    fn: () => Promise<T>,
  ): Promise<T> {
    return withActivityLog(this.deps.activityLog, { integrationId, action, input }, fn, this.clock);
  }

  pullObservations(integrationId: string): Promise<PullObservationsResult> {
    return this.logged(integrationId, 'pull_observations', {}, async () => {
      const integration = await this.loadIntegration(integrationId);
      return this.deps.pipeline.pull(integration, this.stateMachineFor(integrationId));
    });
  }

  /** Processes one file, or every pending file in name order when none is named. */
  processObservations(
    integrationId: string,
    input: ProcessObservationsInput,
  ): Promise<ProcessObservationsResult> {
    return this.logged(integrationId, 'process_observations', { ...input }, async () => {
      const integration = await this.loadIntegration(integrationId);
      const stateMachine = this.stateMachineFor(integrationId);
      const filenames = input.filename ? [input.filename] : await stateMachine.listPending();

      let processed = 0;
      for (const filename of filenames) {
        processed += await this.deps.pipeline.processFile(integration, stateMachine, filename);
      }
      return { observations_processed: processed };
    });
  }

  getFileStatus(integrationId: string, input: FileActionInput): Promise<FileStatusResult> {
    return this.logged(integrationId, 'get_file_status', { ...input }, async () => {
      await this.loadIntegration(integrationId);
      const status = await this.stateMachineFor(integrationId).getStatus(input.filename);
      return { file_status: status };
    });
  }

  setFileStatus(integrationId: string, input: SetFileStatusInput): Promise<FileStatusResult> {
    return this.logged(integrationId, 'set_file_status', { ...input }, async () => {
      await this.loadIntegration(integrationId);
      const stateMachine = this.stateMachineFor(integrationId);
      const result = await stateMachine.setStatus(input.filename, input.status);
      return stateMachine.toActionResult(result, input.filename);
    });
  }

  reprocessFile(integrationId: string, input: FileActionInput): Promise<ProcessObservationsResult> {
    return this.logged(integrationId, 'reprocess_file', { ...input }, async () => {
      const integration = await this.loadIntegration(integrationId);
      try {
        const processed = await this.deps.pipeline.processFile(
          integration,
          this.stateMachineFor(integrationId),
          input.filename,
        );
        return { observations_processed: processed };
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`[actions] reprocess for file '${input.filename}' failed`, {
          integrationId,
          error: reason,
        });
        return {
          observations_processed: 0,
          message: `Reprocess for file '${input.filename}' failed. Error: ${reason}.`,
        };
      }
    });
  }
}
