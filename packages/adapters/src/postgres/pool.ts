import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

let _pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString: process.env['DATABASE_URL'],
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'wildlife-telemetry-relay',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(
  fn: (client: DbClient) => Promise<T>,
  pool: DbPool = getPool(),
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

const SCHEMA_STATEMENTS = [
  `CREATE SCHEMA IF NOT EXISTS telemetry`,
  `CREATE TABLE IF NOT EXISTS telemetry.integrations (
     id          TEXT PRIMARY KEY,
     name        TEXT,
     created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
   )`,
  `CREATE TABLE IF NOT EXISTS telemetry.integration_configurations (
     integration_id  TEXT NOT NULL REFERENCES telemetry.integrations (id) ON DELETE CASCADE,
     action_id       TEXT NOT NULL,
     data            JSONB NOT NULL DEFAULT '{}'::jsonb,
     PRIMARY KEY (integration_id, action_id)
   )`,
  `CREATE TABLE IF NOT EXISTS telemetry.staging_file_groups (
     group_name  TEXT NOT NULL,
     value       TEXT NOT NULL,
     added_at    TIMESTAMPTZ NOT NULL DEFAULT NOW(),
     PRIMARY KEY (group_name, value)
   )`,
  `CREATE TABLE IF NOT EXISTS telemetry.staging_blobs (
     integration_id  TEXT NOT NULL,
     blob_name       TEXT NOT NULL,
     payload         TEXT NOT NULL,
     metadata        JSONB NOT NULL DEFAULT '{}'::jsonb,
     created_at      TIMESTAMPTZ NOT NULL DEFAULT NOW(),
     updated_at      TIMESTAMPTZ NOT NULL DEFAULT NOW(),
     PRIMARY KEY (integration_id, blob_name)
   )`,
  `CREATE TABLE IF NOT EXISTS telemetry.activity_logs (
     id              BIGSERIAL PRIMARY KEY,
     run_id          UUID NOT NULL,
     integration_id  TEXT NOT NULL,
     action          TEXT NOT NULL,
     phase           TEXT NOT NULL,
     ts              TIMESTAMPTZ NOT NULL,
     payload         JSONB NOT NULL DEFAULT '{}'::jsonb
   )`,
];

/** Idempotent: safe to run on every startup. */
export async function applySchema(pool: DbPool = getPool()): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await pool.query(statement);
  }
}
