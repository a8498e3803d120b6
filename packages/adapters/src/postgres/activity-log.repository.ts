import type { ActivityEntry, ActivityLogPort } from '@wildlife-telemetry/domain';
import { getPool } from './pool.js';
import type { DbPool } from './pool.js';

export class PgActivityLogRepository implements ActivityLogPort {
  constructor(private readonly pool: DbPool = getPool()) {}

  async record(entry: ActivityEntry): Promise<void> {
    await this.pool.query(
      `INSERT INTO telemetry.activity_logs
         (run_id, integration_id, action, phase, ts, payload)
       VALUES
         ($1, $2, $3, $4, $5, $6::jsonb)`,
      [
        entry.runId,
        entry.integrationId,
        entry.action,
        entry.phase,
        entry.ts,
        JSON.stringify(entry.payload),
      ],
    );
  }
}
