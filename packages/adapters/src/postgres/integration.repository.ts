import type {
  Integration,
  IntegrationActionId,
  IntegrationConfiguration,
  IntegrationRepositoryPort,
} from '@wildlife-telemetry/domain';
import { getPool } from './pool.js';
import type { DbPool } from './pool.js';

const KNOWN_ACTIONS: readonly IntegrationActionId[] = ['auth', 'pull_observations', 'process_observations'];

function isKnownAction(value: string): value is IntegrationActionId {
  return KNOWN_ACTIONS.some((action) => action === value);
}

export class PgIntegrationRepository implements IntegrationRepositoryPort {
  constructor(private readonly pool: DbPool = getPool()) {}

  async findById(integrationId: string): Promise<Integration | null> {
    const { rows } = await this.pool.query<{ id: string; name: string | null }>(
      `SELECT id, name FROM telemetry.integrations WHERE id = $1`,
      [integrationId],
    );
    const row = rows[0];
    if (!row) return null;

    const { rows: configRows } = await this.pool.query<{
      action_id: string;
      data: Record<string, unknown> | null;
    }>(
      `SELECT action_id, data FROM telemetry.integration_configurations
       WHERE integration_id = $1
       ORDER BY action_id`,
      [integrationId],
    );

    const configurations: IntegrationConfiguration[] = [];
    for (const config of configRows) {
      // unknown action ids belong to other integration types sharing the table
      if (!isKnownAction(config.action_id)) continue;
      configurations.push({ action: config.action_id, data: config.data ?? {} });
    }

    return { id: row.id, name: row.name ?? undefined, configurations };
  }
}
