import type { NaiveDateTime } from '@wildlife-telemetry/domain';

// Wall clock with optional seconds and fraction; month, day and time fields may
// drop their leading zero. A trailing zone designator is accepted and dropped:
// the device's GMT offset is authoritative.
const NAIVE_TIMESTAMP =
  /^(\d{4})-(\d{1,2})-(\d{1,2})[T ](\d{1,2}):(\d{1,2})(?::(\d{1,2})(?:[.,](\d{1,9}))?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/** Returns null for anything that is not a real calendar date and time. */
export function parseNaiveDateTime(raw: string): NaiveDateTime | null {
  const match = NAIVE_TIMESTAMP.exec(raw.trim());
  if (!match) return null;

  const [, y, mo, d, h, mi, s, frac] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = s === undefined ? 0 : Number(s);
  const millis = frac === undefined ? 0 : Number(frac.padEnd(3, '0').slice(0, 3));

  if (hour > 23 || minute > 59 || second > 59) return null;

  const wallClockMs = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const check = new Date(wallClockMs);
  // rejects 2024-02-30 and friends, which Date.UTC silently rolls over
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }

  return { iso: check.toISOString().slice(0, 23), wallClockMs };
}
