const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS` in local time, the pattern the
 * engine variables and the `timestamp` columns share.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Parses `YYYY-MM-DD HH:MM:SS` (a `T` separator and fractional seconds are
 * tolerated) as local time. A trailing `Z` or UTC offset is dropped without
 * shifting the wall-clock time, as a `timestamp` column does on input.
 * Returns null for anything else.
 */
export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [year, month, day, hours, minutes, seconds] = match
    .slice(1)
    .map((part) => Number.parseInt(part, 10));
  const date = new Date(year, month - 1, day, hours, minutes, seconds);

  // Rejects overflowing parts such as month 13 or 25:00:00.
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hours
  ) {
    return null;
  }
  return date;
}

export function toTimestampString(value: Date | string): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatTimestamp(value);
  }
  const parsed = parseTimestamp(value);
  return parsed ? formatTimestamp(parsed) : null;
}
