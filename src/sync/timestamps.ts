/**
 * Timestamp handling.
 *
 * Every comparison happens on epoch milliseconds of an absolute instant.
 * Persisted timestamps must carry a zone designator (Z or ±hh:mm); a naive
 * timestamp is rejected instead of being read in the machine's local zone.
 */

const ISO_WITH_ZONE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;

export function hasZoneDesignator(value: string): boolean {
  return ISO_WITH_ZONE.test(value);
}

/**
 * Parse a persisted ISO 8601 timestamp into epoch milliseconds.
 * Throws when the value is naive or not a timestamp at all.
 */
export function parseTimestamp(value: string): number {
  if (!hasZoneDesignator(value)) {
    throw new Error(`Timestamp "${value}" has no timezone designator`);
  }
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new Error(`Timestamp "${value}" is not a valid date`);
  }
  return ms;
}

/** Millisecond-precision epoch value of a Date (drops sub-ms mtime fractions). */
export function toEpochMs(date: Date): number {
  return Math.trunc(date.getTime());
}

/** ISO 8601 UTC representation used for everything written to disk. */
export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

/** True when `candidate` is strictly later than `baseline`. */
export function isNewer(candidate: Date, baseline: string | undefined): boolean {
  if (baseline === undefined) return true;
  return toEpochMs(candidate) > parseTimestamp(baseline);
}
