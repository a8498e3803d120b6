// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, withTransaction, applySchema } from './postgres/pool.js';
export type { DbPool, DbClient } from './postgres/pool.js';
export { PgGroupStore } from './postgres/group-store.js';
export { PgBlobStorage } from './postgres/blob-storage.js';
export { PgIntegrationRepository } from './postgres/integration.repository.js';
export { PgActivityLogRepository } from './postgres/activity-log.repository.js';

// ─── HTTP Adapters ────────────────────────────────────────────────────────────
export {
  HttpVendorFeedClient,
  basicAuthHeader,
  DEFAULT_VENDOR_TIMEOUT_MS,
} from './http/vendor-feed.client.js';
export type { HttpClientOptions } from './http/vendor-feed.client.js';
export { SensorApiClient, toSensorPayload } from './http/sensor-api.client.js';
export type { SensorApiClientOptions, SensorObservationPayload } from './http/sensor-api.client.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { systemClock, DeterministicClock, formatCompactTimestamp } from './clock/clock.js';
export type { Clock } from './clock/clock.js';
