import {
  HttpVendorFeedClient,
  PgActivityLogRepository,
  PgBlobStorage,
  PgGroupStore,
  PgIntegrationRepository,
  SensorApiClient,
  getPool,
} from '@wildlife-telemetry/adapters';
import type { IntegrationActionsPort } from '@wildlife-telemetry/domain';
import type { Settings } from './config/settings.js';
import { IngestionPipeline } from './services/pipeline/ingestion-pipeline.js';
import { IntegrationActionsService } from './services/actions/integration-actions.service.js';
import { fixedDelayPolicy } from './services/retry/retry-policy.js';

export interface AppContainer {
  actions: IntegrationActionsPort;
}

/** Wires the production adapters. Tests build their own container from fakes. */
export function buildContainer(settings: Settings): AppContainer {
  const pool = getPool();
  const blobs = new PgBlobStorage(pool);
  const groups = new PgGroupStore(pool);

  const pipeline = new IngestionPipeline({
    vendorFeed: new HttpVendorFeedClient({ timeoutMs: settings.vendorRequestTimeoutMs }),
    blobs,
    sink: new SensorApiClient({
      baseUrl: settings.sensorsApiBaseUrl,
      apiKey: settings.sensorsApiKey,
    }),
    retryPolicy: fixedDelayPolicy({
      maxAttempts: settings.retryMaxAttempts,
      delayMs: settings.retryDelayMs,
    }),
  });

  return {
    actions: new IntegrationActionsService({
      integrations: new PgIntegrationRepository(pool),
      groups,
      blobs,
      activityLog: new PgActivityLogRepository(pool),
      pipeline,
    }),
  };
}
