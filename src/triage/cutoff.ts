export const MS_PER_HOUR = 3_600_000;

/** Earliest publish time, in ms, still eligible for scanning. */
export function computeCutoff(now: number, lookbackHours: number): number {
  return now - lookbackHours * MS_PER_HOUR;
}
