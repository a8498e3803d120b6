import { z } from 'zod';
import { ConfigurationMissingError } from '@wildlife-telemetry/domain';
import type { Integration, IntegrationActionId } from '@wildlife-telemetry/domain';

export const authConfigSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const pullConfigSchema = z.object({
  data_endpoint: z.string().url(),
  transmissions_endpoint: z.string().url(),
});

export const processConfigSchema = z.object({
  observations_per_request: z.number().int().positive().default(200),
});

export type AuthConfig = z.infer<typeof authConfigSchema>;
export type PullConfig = z.infer<typeof pullConfigSchema>;
export type ProcessConfig = z.infer<typeof processConfigSchema>;

const SETTINGS_LABELS: Record<IntegrationActionId, string> = {
  auth: 'Authentication',
  pull_observations: 'Pull observations',
  process_observations: 'Process observations',
};

function resolve<S extends z.ZodTypeAny>(
  integration: Integration,
  action: IntegrationActionId,
  schema: S,
): z.infer<S> {
  const config = integration.configurations.find((c) => c.action === action);
  const label = SETTINGS_LABELS[action];
  if (!config) {
    throw new ConfigurationMissingError(
      `${label} settings for integration ${integration.id} are missing. ` +
        `Please fix the integration setup in the portal.`,
    );
  }
  const parsed = schema.safeParse(config.data);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ');
    throw new ConfigurationMissingError(
      `${label} settings for integration ${integration.id} are invalid (${fields}). ` +
        `Please fix the integration setup in the portal.`,
    );
  }
  return parsed.data;
}

export function resolveAuthConfig(integration: Integration): AuthConfig {
  return resolve(integration, 'auth', authConfigSchema);
}

export function resolvePullConfig(integration: Integration): PullConfig {
  return resolve(integration, 'pull_observations', pullConfigSchema);
}

/** Processing settings are optional; defaults apply when the integration has none. */
export function resolveProcessConfig(integration: Integration): ProcessConfig {
  const configured = integration.configurations.some((c) => c.action === 'process_observations');
  if (!configured) return processConfigSchema.parse({});
  return resolve(integration, 'process_observations', processConfigSchema);
}
