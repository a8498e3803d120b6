// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/naive-date-time.js';
export * from './entities/vendor-location-record.js';
export * from './entities/vendor-transmission-record.js';
export * from './entities/staging-file.js';
export * from './entities/transformed-observation.js';
export * from './entities/integration.js';
export * from './entities/activity-entry.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/integration-actions.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/blob-storage.port.js';
export * from './ports/outbound/group-store.port.js';
export * from './ports/outbound/observation-sink.port.js';
export * from './ports/outbound/vendor-feed.port.js';
export * from './ports/outbound/integration-repository.port.js';
export * from './ports/outbound/activity-log.port.js';
