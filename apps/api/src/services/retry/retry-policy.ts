import { setTimeout as delay } from 'node:timers/promises';
import { TransientTransportError } from '@wildlife-telemetry/domain';

export interface RetryPolicy {
  readonly maxAttempts: number;
  /** Fixed wait between attempts; there is no backoff. */
  readonly delayMs: number;
  readonly isRetryable: (err: unknown) => boolean;
}

export type Sleep = (ms: number) => Promise<void>;

export const isTransientTransportError = (err: unknown): boolean => err instanceof TransientTransportError;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 10_000,
  isRetryable: isTransientTransportError,
};

export function fixedDelayPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...overrides };
}

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface RetryOptions {
  /** Names the unit of work in logs. */
  label: string;
  sleep?: Sleep;
}

export async function executeWithRetry<T>(
  policy: RetryPolicy,
  work: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await work(attempt);
    } catch (err) {
      if (!policy.isRetryable(err) || attempt >= policy.maxAttempts) throw err;
      console.warn(
        `[retry] ${options.label} failed (attempt ${attempt}/${policy.maxAttempts}), retrying in ${policy.delayMs} ms`,
        { error: err instanceof Error ? err.message : String(err) },
      );
      await sleep(policy.delayMs);
    }
  }
}
