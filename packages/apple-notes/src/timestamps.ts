/** Seconds between the Unix epoch and Core Data's reference date, 2001-01-01T00:00:00Z. */
export const CORE_DATA_EPOCH_OFFSET_SECONDS = 978_307_200;

export function appleTimestampToDate(timestamp: number | null | undefined): Date | null {
  if (timestamp === null || timestamp === undefined || !Number.isFinite(timestamp)) {
    return null;
  }
  const date = new Date((timestamp + CORE_DATA_EPOCH_OFFSET_SECONDS) * 1000);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function appleTimestampToIso(timestamp: number | null | undefined): string | null {
  return appleTimestampToDate(timestamp)?.toISOString() ?? null;
}
