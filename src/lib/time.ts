/**
 * Trendwire — Timestamp helpers
 *
 * Timestamps travel as ISO-8601 strings. A string with a zone designator
 * is an absolute instant. A naive string (no designator) is read as local
 * wall-clock time, i.e. it takes the zone of the local "now" it is
 * compared against.
 */

const ZONE_DESIGNATOR = /T.*(Z|[+-]\d{2}(:?\d{2})?)$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

const MS_PER_HOUR = 3_600_000;

export function isZoneAware(timestamp: string): boolean {
  return ZONE_DESIGNATOR.test(timestamp.trim());
}

/**
 * Resolve a timestamp to epoch milliseconds, or null when unparsable.
 */
export function toInstant(timestamp: string): number | null {
  const value = timestamp.trim();
  if (isZoneAware(value)) {
    return parseOrNull(value);
  }
  // Naive: Date.parse reads date-time strings as local time but
  // date-only strings as UTC, so give dates a local midnight
  return parseOrNull(DATE_ONLY.test(value) ? `${value}T00:00:00` : value);
}

function parseOrNull(value: string): number | null {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Hours elapsed between a timestamp and `now`. Null when the timestamp
 * cannot be parsed.
 */
export function hoursSince(timestamp: string, now: Date = new Date()): number | null {
  const instant = toInstant(timestamp);
  if (instant === null) return null;
  return (now.getTime() - instant) / MS_PER_HOUR;
}

/**
 * Unix seconds (as served by Hacker News and Reddit) to an ISO string.
 */
export function fromUnixSeconds(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}
