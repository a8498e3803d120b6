import type { BlobMetadata, BlobStoragePort } from '@wildlife-telemetry/domain';
import { getPool } from './pool.js';
import type { DbPool } from './pool.js';

/** Raw vendor payloads kept in PostgreSQL, addressed by (integration, blob name). */
export class PgBlobStorage implements BlobStoragePort {
  constructor(private readonly pool: DbPool = getPool()) {}

  async upload(
    integrationId: string,
    payload: string,
    destinationName: string,
    metadata: BlobMetadata,
  ): Promise<void> {
    await this.pool.query(
      `INSERT INTO telemetry.staging_blobs (integration_id, blob_name, payload, metadata)
       VALUES ($1, $2, $3, $4::jsonb)
       ON CONFLICT (integration_id, blob_name)
       DO UPDATE SET payload = EXCLUDED.payload, metadata = EXCLUDED.metadata, updated_at = NOW()`,
      [integrationId, destinationName, payload, JSON.stringify(metadata)],
    );
  }

  /** Merges into the existing metadata, like object-store metadata patches. */
  async updateMetadata(integrationId: string, blobName: string, metadata: BlobMetadata): Promise<void> {
    await this.pool.query(
      `UPDATE telemetry.staging_blobs
       SET metadata = metadata || $3::jsonb, updated_at = NOW()
       WHERE integration_id = $1 AND blob_name = $2`,
      [integrationId, blobName, JSON.stringify(metadata)],
    );
  }

  async download(integrationId: string, blobName: string): Promise<string | null> {
    const { rows } = await this.pool.query<{ payload: string }>(
      `SELECT payload FROM telemetry.staging_blobs
       WHERE integration_id = $1 AND blob_name = $2`,
      [integrationId, blobName],
    );
    return rows[0]?.payload ?? null;
  }
}
