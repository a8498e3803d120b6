import type { GroupStorePort } from '@wildlife-telemetry/domain';
import { getPool, withTransaction } from './pool.js';
import type { DbPool } from './pool.js';

// First key of the two-key advisory lock; the second is hashtext(filename).
const STAGING_LOCK_NAMESPACE = 7341;

export class PgGroupStore implements GroupStorePort {
  constructor(private readonly pool: DbPool = getPool()) {}

  async add(group: string, values: string[]): Promise<void> {
    if (values.length === 0) return;
    await this.pool.query(
      `INSERT INTO telemetry.staging_file_groups (group_name, value)
       SELECT $1, unnest($2::text[])
       ON CONFLICT DO NOTHING`,
      [group, values],
    );
  }

  async isMember(group: string, value: string): Promise<boolean> {
    const { rows } = await this.pool.query<{ found: boolean }>(
      `SELECT EXISTS (
         SELECT 1 FROM telemetry.staging_file_groups
         WHERE group_name = $1 AND value = $2
       ) AS found`,
      [group, value],
    );
    return rows[0]?.found ?? false;
  }

  /** Values that are not members of `fromGroup` are left untouched and not counted. */
  async move(fromGroup: string, toGroup: string, values: string[]): Promise<number> {
    if (values.length === 0) return 0;
    return withTransaction(async (client) => {
      // sorted so two movers never wait on each other's locks in opposite order
      for (const value of [...values].sort()) {
        await client.query('SELECT pg_advisory_xact_lock($1, hashtext($2))', [
          STAGING_LOCK_NAMESPACE,
          value,
        ]);
      }
      const { rows } = await client.query<{ value: string }>(
        `DELETE FROM telemetry.staging_file_groups
         WHERE group_name = $1 AND value = ANY($2::text[])
         RETURNING value`,
        [fromGroup, values],
      );
      if (rows.length === 0) return 0;
      await client.query(
        `INSERT INTO telemetry.staging_file_groups (group_name, value)
         SELECT $1, unnest($2::text[])
         ON CONFLICT DO NOTHING`,
        [toGroup, rows.map((r) => r.value)],
      );
      return rows.length;
    }, this.pool);
  }

  async members(group: string): Promise<string[]> {
    const { rows } = await this.pool.query<{ value: string }>(
      `SELECT value FROM telemetry.staging_file_groups
       WHERE group_name = $1
       ORDER BY value ASC`,
      [group],
    );
    return rows.map((r) => r.value);
  }
}
