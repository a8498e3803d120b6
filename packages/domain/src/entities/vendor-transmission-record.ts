import type { NaiveDateTime } from './naive-date-time.js';
import type { VendorFlag } from './vendor-location-record.js';

/** Session metadata from the vendor "transmissions" endpoint. Never forwarded downstream. */
export interface VendorTransmissionRecord {
  readonly deviceId: string;
  readonly dateSent: NaiveDateTime;
  readonly numberFixes?: number;
  readonly battVoltage?: number;
  readonly mortality?: string;
  readonly breakOff?: string;
  readonly satErrors?: string;
  readonly yearBase?: string;
  readonly dayBase?: string;
  readonly gmtOffset?: number; // whole hours
  readonly lowBattVoltage?: VendorFlag;
}
