import { v4 as uuidv4 } from 'uuid';
import type { ActivityLogPort, ActivityPhase } from '@wildlife-telemetry/domain';
import { systemClock } from '@wildlife-telemetry/adapters';
import type { Clock } from '@wildlife-telemetry/adapters';

export interface ActivityDescriptor {
  integrationId: string;
  action: string;
  input?: Record<string, unknown>;
}

/** Best-effort: an action never fails because its audit entry could not be written. */
async function record(
  log: ActivityLogPort,
  descriptor: ActivityDescriptor,
  runId: string,
  phase: ActivityPhase,
  payload: Record<string, unknown>,
  clock: Clock,
): Promise<void> {
  try {
    await log.record({
      integrationId: descriptor.integrationId,
      action: descriptor.action,
      phase,
      runId,
      ts: clock.now(),
      payload,
    });
  } catch (err) {
    console.error('[activity-log] failed to write activity entry', {
      integrationId: descriptor.integrationId,
      action: descriptor.action,
      phase,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

/** Wraps one top-level action: records started, then completed or failed, and rethrows failures. */
export async function withActivityLog<T>(
  log: ActivityLogPort,
  descriptor: ActivityDescriptor,
  fn: () => Promise<T>,
  clock: Clock = systemClock,
): Promise<T> {
  const runId = uuidv4();
  await record(log, descriptor, runId, 'started', { input: descriptor.input ?? {} }, clock);
  try {
    const result = await fn();
    await record(log, descriptor, runId, 'completed', { result }, clock);
    return result;
  } catch (err) {
    await record(
      log,
      descriptor,
      runId,
      'failed',
      { error: err instanceof Error ? err.message : String(err) },
      clock,
    );
    throw err;
  }
}
