import type {
  NaiveDateTime,
  VendorLocationRecord,
  VendorTransmissionRecord,
} from '@wildlife-telemetry/domain';

const MS_PER_HOUR = 3_600_000;
const MS_PER_DAY = 86_400_000;
export const MAX_OFFSET_HOURS = 24;

export interface OffsetContext {
  integrationId: string;
  actionId: string;
}

/**
 * GMT offset per device. The first transmission seen for a device decides;
 * one without a GmtOffset pins the device to 0.
 */
export function deriveOffsets(
  transmissions: readonly VendorTransmissionRecord[],
  integrationId: string,
): Map<string, number> {
  const offsets = new Map<string, number>();
  if (transmissions.length === 0) {
    console.warn(`[time-correction] no transmissions were pulled for integration ID: ${integrationId}`);
    console.warn(`[time-correction] setting GMT offset to 0 for devices in integration ID: ${integrationId}`);
    return offsets;
  }
  for (const transmission of transmissions) {
    if (!offsets.has(transmission.deviceId)) {
      offsets.set(transmission.deviceId, transmission.gmtOffset ?? 0);
    }
  }
  return offsets;
}

/** Returns the offset to use: the given one, or 0 (with a diagnostic) when it is out of range. */
export function resolveOffset(deviceId: string, offsetHours: number, context: OffsetContext): number {
  if (Math.abs(offsetHours) <= MAX_OFFSET_HOURS) return offsetHours;
  console.error(`[time-correction] GMT offset invalid for device '${deviceId}' value '${offsetHours}'`, {
    attentionNeeded: true,
    integrationId: context.integrationId,
    actionId: context.actionId,
  });
  return 0;
}

/** Reads the record's wall clock as local time at a fixed UTC offset. */
export function applyOffset(record: VendorLocationRecord, offsetHours: number, context: OffsetContext): Date {
  const offset = resolveOffset(record.deviceId, offsetHours, context);
  return new Date(record.recordedAt.wallClockMs - offset * MS_PER_HOUR);
}

/**
 * Corrects every record of one device. The offset is checked once, so a bad
 * offset yields one diagnostic per device rather than one per record.
 */
export function correctDevice(
  deviceId: string,
  records: readonly VendorLocationRecord[],
  offsetHours: number,
  context: OffsetContext,
): Date[] {
  const offset = resolveOffset(deviceId, offsetHours, context);
  return records.map((record) => applyOffset(record, offset, context));
}

/** Whole days from `target` to `date`, floored towards the past, without sign. */
export function dayDistance(date: number, target: number): number {
  return Math.abs(Math.floor((date - target) / MS_PER_DAY));
}

/**
 * Picks the transmission nearest to `target` over the ascending distinct
 * transmission dates. Distance is counted in whole days, floored, so
 * neighbours less than a day apart can tie. `previous` starts at the latest
 * date, so a target that precedes every transmission is weighed against the
 * far end of the range and a tie there goes to the latest date.
 * Of several transmissions sharing the chosen date, the first in input order wins.
 */
export function findNearestTransmission(
  transmissions: readonly VendorTransmissionRecord[],
  target: NaiveDateTime,
): VendorTransmissionRecord | null {
  const firstByDate = new Map<number, VendorTransmissionRecord>();
  for (const transmission of transmissions) {
    if (!firstByDate.has(transmission.dateSent.wallClockMs)) {
      firstByDate.set(transmission.dateSent.wallClockMs, transmission);
    }
  }
  const dates = [...firstByDate.keys()].sort((a, b) => a - b);
  if (dates.length === 0) return null;

  const targetMs = target.wallClockMs;
  const latest = dates[dates.length - 1];
  let previous = latest;
  for (const date of dates) {
    if (date >= targetMs) {
      const chosen = dayDistance(date, targetMs) < dayDistance(previous, targetMs) ? date : previous;
      return firstByDate.get(chosen) ?? null;
    }
    previous = date;
  }
  return firstByDate.get(latest) ?? null;
}
