/**
 * A wall-clock reading with no zone attached.
 * `wallClockMs` is the epoch value obtained by reading the wall clock as UTC;
 * it is only meaningful once a GMT offset is applied.
 */
export interface NaiveDateTime {
  readonly iso: string; // YYYY-MM-DDTHH:mm:ss.SSS
  readonly wallClockMs: number;
}
