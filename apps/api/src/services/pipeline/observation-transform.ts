import { OBSERVATION_TYPE } from '@wildlife-telemetry/domain';
import type { TransformedObservation, VendorLocationRecord } from '@wildlife-telemetry/domain';
import { correctDevice } from '../time/time-correction.js';
import type { OffsetContext } from '../time/time-correction.js';

type AdditionalField =
  | 'numSats'
  | 'hdop'
  | 'fixTime'
  | 'dimension'
  | 'activity'
  | 'temperature'
  | 'mortality'
  | 'lowBattVoltage';

// Vendor fields not promoted to first-class attributes, keyed the way the
// ingestion API expects them.
const ADDITIONAL_FIELDS: ReadonlyArray<readonly [AdditionalField, string]> = [
  ['numSats', 'num_sats'],
  ['hdop', 'hdop'],
  ['fixTime', 'fix_time'],
  ['dimension', 'dimension'],
  ['activity', 'activity'],
  ['temperature', 'temperature'],
  ['mortality', 'mortality'],
  ['lowBattVoltage', 'low_batt_voltage'],
];

export function toObservation(record: VendorLocationRecord, recordedAt: Date): TransformedObservation {
  const additional: Record<string, string | boolean> = {};
  for (const [field, key] of ADDITIONAL_FIELDS) {
    const value = record[field];
    if (value !== undefined) additional[key] = value;
  }
  return {
    source: record.deviceId,
    sourceName: record.deviceId,
    type: OBSERVATION_TYPE,
    recordedAt,
    location: { lat: record.latitude, lon: record.longitude },
    additional,
  };
}

export function transformDevice(
  deviceId: string,
  records: readonly VendorLocationRecord[],
  offsetHours: number,
  context: OffsetContext,
): TransformedObservation[] {
  const instants = correctDevice(deviceId, records, offsetHours, context);
  return records.map((record, i) => toObservation(record, instants[i]));
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) throw new RangeError(`batch size must be positive, got ${size}`);
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
