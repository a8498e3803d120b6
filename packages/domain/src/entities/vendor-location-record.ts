import type { NaiveDateTime } from './naive-date-time.js';

/** Vendor flag text is converted to a boolean only when it is unambiguous. */
export type VendorFlag = boolean | string;

/** One GPS fix from the vendor "data points" endpoint. */
export interface VendorLocationRecord {
  readonly deviceId: string;
  readonly longitude: number | null; // -180..360
  readonly latitude: number | null; // -90..90
  readonly recordedAt: NaiveDateTime;
  readonly numSats?: string;
  readonly hdop?: string;
  readonly fixTime?: string;
  readonly dimension?: string;
  readonly activity?: string;
  readonly temperature?: string;
  readonly mortality?: VendorFlag;
  readonly lowBattVoltage?: VendorFlag;
}

export type LocationsByDevice = Map<string, VendorLocationRecord[]>;
