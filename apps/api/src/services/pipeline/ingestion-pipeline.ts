import { v4 as uuidv4 } from 'uuid';
import { IntegrationActionError, StateTransitionError } from '@wildlife-telemetry/domain';
import type {
  BlobStoragePort,
  FileStatus,
  Integration,
  ObservationSinkPort,
  PullObservationsResult,
  VendorCredentials,
  VendorFeedPort,
  VendorRequestContext,
  VendorTransmissionRecord,
} from '@wildlife-telemetry/domain';
import { formatCompactTimestamp, systemClock } from '@wildlife-telemetry/adapters';
import type { Clock } from '@wildlife-telemetry/adapters';
import { resolveAuthConfig, resolveProcessConfig, resolvePullConfig } from '../../config/integration-config.js';
import { parseLocations, parseTransmissions } from '../vendor/response-parser.js';
import { deriveOffsets } from '../time/time-correction.js';
import { DEFAULT_RETRY_POLICY, executeWithRetry } from '../retry/retry-policy.js';
import type { RetryPolicy, Sleep } from '../retry/retry-policy.js';
import type { FileStateMachine } from '../staging/file-state-machine.js';
import { chunk, transformDevice } from './observation-transform.js';

const DATA_POINTS_SUFFIX = '_data_points.xml';
const TRANSMISSIONS_SUFFIX = '_transmissions.xml';

export interface PipelineDeps {
  vendorFeed: VendorFeedPort;
  blobs: BlobStoragePort;
  sink: ObservationSinkPort;
  clock?: Clock;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  /** Short token that keeps concurrently staged filenames apart. */
  generateId?: () => string;
}

/** Name of the transmissions payload staged alongside a data-points payload. */
export function siblingTransmissionsName(dataPointsFile: string): string | null {
  if (!dataPointsFile.endsWith(DATA_POINTS_SUFFIX)) return null;
  return dataPointsFile.slice(0, -DATA_POINTS_SUFFIX.length) + TRANSMISSIONS_SUFFIX;
}

/**
 * fetch → stage → parse → correct → transform → dispatch.
 * Holds no state between runs; every store arrives through `deps` or the
 * state machine handed in by the caller.
 */
export class IngestionPipeline {
  private readonly clock: Clock;
  private readonly retryPolicy: RetryPolicy;
  private readonly generateId: () => string;

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? systemClock;
    this.retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.generateId = deps.generateId ?? (() => uuidv4().slice(0, 8));
  }

  private fetchWithRetry(
    endpoint: string,
    credentials: VendorCredentials,
    label: string,
  ): Promise<string> {
    return executeWithRetry(this.retryPolicy, () => this.deps.vendorFeed.fetchXml(endpoint, credentials), {
      label,
      sleep: this.deps.sleep,
    });
  }

  async pull(integration: Integration, stateMachine: FileStateMachine): Promise<PullObservationsResult> {
    const auth = resolveAuthConfig(integration);
    const pullConfig = resolvePullConfig(integration);
    const credentials: VendorCredentials = { username: auth.username, password: auth.password };

    console.info(`[pipeline] getting transmissions for integration ID: ${integration.id}`, {
      endpoint: pullConfig.transmissions_endpoint,
    });
    const transmissionsXml = await this.fetchWithRetry(
      pullConfig.transmissions_endpoint,
      credentials,
      `fetch transmissions (${integration.id})`,
    );
    parseTransmissions(transmissionsXml, {
      integrationId: integration.id,
      endpoint: pullConfig.transmissions_endpoint,
      username: auth.username,
    });

    console.info(`[pipeline] getting data points for integration ID: ${integration.id}`, {
      endpoint: pullConfig.data_endpoint,
    });
    const dataXml = await this.fetchWithRetry(
      pullConfig.data_endpoint,
      credentials,
      `fetch data points (${integration.id})`,
    );
    const locations = parseLocations(dataXml, {
      integrationId: integration.id,
      endpoint: pullConfig.data_endpoint,
      username: auth.username,
    });

    const base = `${formatCompactTimestamp(this.clock.now())}_${integration.id}_${this.generateId()}`;
    const transmissionsFile = `${base}${TRANSMISSIONS_SUFFIX}`;
    const dataPointsFile = `${base}${DATA_POINTS_SUFFIX}`;

    await this.deps.blobs.upload(integration.id, transmissionsXml, transmissionsFile, {
      integration_id: integration.id,
      ats_username: auth.username,
    });
    await this.deps.blobs.upload(integration.id, dataXml, dataPointsFile, {
      integration_id: integration.id,
      ats_username: auth.username,
      status: 'pending',
    });
    await stateMachine.register(dataPointsFile);

    let extracted = 0;
    for (const records of locations.values()) extracted += records.length;
    console.info(`[pipeline] observations pulled with success for integration ID: ${integration.id}`, {
      dataPointsFile,
      extracted,
    });

    return {
      observations_extracted: extracted,
      transmissions_file: transmissionsFile,
      data_points_file: dataPointsFile,
    };
  }

  private async transition(stateMachine: FileStateMachine, filename: string, target: FileStatus): Promise<void> {
    let result = await stateMachine.setStatus(filename, target);
    if (result.kind === 'defaulted_to_pending' && target !== 'pending') {
      // untracked file: it is pending now, so the requested move can proceed
      result = await stateMachine.setStatus(filename, target);
    }
    if (result.kind === 'failed') {
      throw new StateTransitionError(filename, result.error.message, { cause: result.error });
    }
  }

  private async loadTransmissions(
    integrationId: string,
    filename: string,
    context: VendorRequestContext,
  ): Promise<VendorTransmissionRecord[]> {
    const transmissionsFile = siblingTransmissionsName(filename);
    const xml = transmissionsFile === null ? null : await this.deps.blobs.download(integrationId, transmissionsFile);
    if (xml === null) {
      console.warn(`[pipeline] no staged transmissions for '${filename}'`, { integrationId, transmissionsFile });
      return [];
    }
    return parseTransmissions(xml, context);
  }

  /**
   * Processes one staged data-points file regardless of its tracked state and
   * returns the number of observations dispatched. Batches go out in order; a
   * batch that exhausts its retries aborts the rest. Batches already sent are
   * not recalled.
   */
  async processFile(integration: Integration, stateMachine: FileStateMachine, filename: string): Promise<number> {
    const processConfig = resolveProcessConfig(integration);
    const context: VendorRequestContext = { integrationId: integration.id };

    await this.transition(stateMachine, filename, 'in_progress');
    try {
      const dataXml = await this.deps.blobs.download(integration.id, filename);
      if (dataXml === null) {
        throw new IntegrationActionError(
          `Staged file '${filename}' not found in storage for integration '${integration.id}'.`,
          404,
          true,
        );
      }
      const transmissions = await this.loadTransmissions(integration.id, filename, context);
      const locations = parseLocations(dataXml, context);
      const offsets = deriveOffsets(transmissions, integration.id);
      console.info(`[pipeline] integration ID: ${integration.id}, GMT offsets`, Object.fromEntries(offsets));

      let dispatched = 0;
      for (const [deviceId, records] of locations) {
        const observations = transformDevice(deviceId, records, offsets.get(deviceId) ?? 0, {
          integrationId: integration.id,
          actionId: 'process_observations',
        });
        const batches = chunk(observations, processConfig.observations_per_request);
        for (const [index, batch] of batches.entries()) {
          console.info(
            `[pipeline] sending observations batch #${index}: ${batch.length} observations. Device: ${deviceId}`,
          );
          try {
            await executeWithRetry(this.retryPolicy, () => this.deps.sink.send(integration.id, batch), {
              label: `dispatch batch #${index} for device ${deviceId}`,
              sleep: this.deps.sleep,
            });
          } catch (err) {
            console.error(`[pipeline] sensor API returned error for integration ID: ${integration.id}`, {
              attentionNeeded: true,
              integrationId: integration.id,
              actionId: 'process_observations',
              error: err instanceof Error ? err.message : String(err),
            });
            throw err;
          }
          dispatched += batch.length;
        }
      }

      await this.transition(stateMachine, filename, 'processed');
      return dispatched;
    } catch (err) {
      const rollback = await stateMachine.setStatus(filename, 'pending');
      if (rollback.kind === 'failed') {
        console.error(`[pipeline] could not return '${filename}' to pending`, {
          integrationId: integration.id,
          error: rollback.error.message,
        });
      }
      throw err;
    }
  }
}
