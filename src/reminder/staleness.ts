export const DEFAULT_STALE_AFTER_SECONDS = 5 * 60 * 60;

/**
 * Seconds between the last update and `now`. Both are absolute instants, so
 * the local timezone plays no part.
 */
export function elapsedSeconds(lastUpdated: Date | number, now: Date | number): number {
  const lastUpdatedMs = typeof lastUpdated === "number" ? lastUpdated : lastUpdated.getTime();
  const nowMs = typeof now === "number" ? now : now.getTime();
  return (nowMs - lastUpdatedMs) / 1000;
}

/** Strictly older than the threshold; exactly at the threshold is not stale. */
export function isStale(
  lastUpdated: Date | number,
  now: Date | number,
  thresholdSeconds: number = DEFAULT_STALE_AFTER_SECONDS,
): boolean {
  return elapsedSeconds(lastUpdated, now) > thresholdSeconds;
}
