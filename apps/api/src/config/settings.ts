/**
 * Process-level settings, read once at startup.
 *
 * Env vars:
 *   PORT                       HTTP port (default: 3001)
 *   CORS_ORIGIN                allowed origin (default: *)
 *   SENSORS_API_BASE_URL       downstream observation ingestion API (default: http://localhost:8080/v2)
 *   SENSORS_API_KEY            bearer key for the ingestion API (optional)
 *   VENDOR_REQUEST_TIMEOUT_MS  upper bound for one vendor request (default: 120000)
 *   RETRY_MAX_ATTEMPTS         attempts per fetch or batch (default: 3)
 *   RETRY_DELAY_MS             fixed wait between attempts (default: 10000)
 *   DATABASE_URL               read by the PostgreSQL pool
 */

export interface Settings {
  port: number;
  corsOrigin: string;
  sensorsApiBaseUrl: string;
  sensorsApiKey?: string;
  vendorRequestTimeoutMs: number;
  retryMaxAttempts: number;
  retryDelayMs: number;
}

function intFromEnv(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const retryMaxAttempts = intFromEnv(env['RETRY_MAX_ATTEMPTS'], 3, 'RETRY_MAX_ATTEMPTS');
  return {
    port: intFromEnv(env['PORT'], 3001, 'PORT'),
    corsOrigin: env['CORS_ORIGIN'] ?? '*',
    sensorsApiBaseUrl: env['SENSORS_API_BASE_URL'] ?? 'http://localhost:8080/v2',
    sensorsApiKey: env['SENSORS_API_KEY'] || undefined,
    vendorRequestTimeoutMs: intFromEnv(env['VENDOR_REQUEST_TIMEOUT_MS'], 120_000, 'VENDOR_REQUEST_TIMEOUT_MS'),
    retryMaxAttempts: Math.max(1, retryMaxAttempts),
    retryDelayMs: intFromEnv(env['RETRY_DELAY_MS'], 10_000, 'RETRY_DELAY_MS'),
  };
}
