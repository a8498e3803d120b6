export interface Clock {
  now(): Date;
}

/** Wall-clock implementation for live runs. */
export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Deterministic clock for tests and replays.
 * Starts at `epochMs` and advances by `tickMs` after each `now()` call.
 */
export class DeterministicClock implements Clock {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 0,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** UTC `yyyyMMddHHmmssSSS`, sortable and safe inside blob names. */
export function formatCompactTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    pad(date.getUTCMilliseconds(), 3)
  );
}
