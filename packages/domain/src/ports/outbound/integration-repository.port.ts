import type { Integration } from '../../entities/integration.js';

export interface IntegrationRepositoryPort {
  findById(integrationId: string): Promise<Integration | null>;
}
