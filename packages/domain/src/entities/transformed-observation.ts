export const OBSERVATION_TYPE = 'tracking-device';

export interface ObservationLocation {
  readonly lat: number | null;
  readonly lon: number | null;
}

/** A normalized, offset-corrected location fix ready for downstream ingestion. */
export interface TransformedObservation {
  readonly source: string;
  readonly sourceName: string;
  readonly type: typeof OBSERVATION_TYPE;
  readonly recordedAt: Date;
  readonly location: ObservationLocation;
  readonly additional: Readonly<Record<string, string | boolean>>;
}
