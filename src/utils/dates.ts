/**
 * Timestamp helpers for watermarks and library dates
 */

const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})?$/;
const ZONE_SUFFIX = /(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parse an ISO 8601 timestamp. Accepts a trailing "Z", an explicit offset
 * such as "+00:00", or no zone at all (read as UTC).
 */
export function parseTimestamp(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (!ISO_PATTERN.test(trimmed)) return undefined;

  const date = new Date(ZONE_SUFFIX.test(trimmed) ? trimmed : `${trimmed}Z`);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * UTC, second precision, trailing "Z": 2024-05-01T09:30:00Z
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Elapsed time as HhMmSs, e.g. 26h3m9s. Negative spans clamp to 0h0m0s.
 */
export function formatElapsed(fromDate: Date, toDate: Date): string {
  const totalSeconds = Math.max(0, Math.floor((toDate.getTime() - fromDate.getTime()) / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}h${minutes}m${seconds}s`;
}

export function maxDate(dates: Date[]): Date | undefined {
  let latest: Date | undefined;
  for (const date of dates) {
    if (!latest || date.getTime() > latest.getTime()) {
      latest = date;
    }
  }
  return latest;
}
