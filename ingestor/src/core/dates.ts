/**
 * Date handling for store values. The store takes "YYYY-MM-DD HH:mm:ss"
 * datetimes and "YYYY-MM-DD" dates, both in UTC.
 */

const ISO_WITH_ZONE = /T.*(Z|[+-]\d{2}:?\d{2})$/i;
const ISO_NAIVE = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}(:\d{2})?)/;

function pad(n: number): string {
  return n.toString().padStart(2, "0");
}

export function formatStoreDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(
    date.getUTCDate()
  )}`;
}

export function formatStoreDateTime(date: Date): string {
  return `${formatStoreDate(date)} ${pad(date.getUTCHours())}:${pad(
    date.getUTCMinutes()
  )}:${pad(date.getUTCSeconds())}`;
}

export class InvalidDateError extends Error {
  constructor(readonly input: string) {
    super(`Failed to parse datetime string '${input}'`);
    this.name = "InvalidDateError";
  }
}

/**
 * Convert a provider date/time to the store's datetime format.
 *
 * - empty values become ""
 * - Date objects and zone-qualified ISO strings are converted to UTC
 * - naive ISO strings lose the "T" and any fractional seconds
 * - other strings (plain dates included) pass through unchanged
 *
 * Throws InvalidDateError for zone-qualified strings that don't parse.
 */
export function toStoreDateTime(value: unknown): string {
  if (value === null || value === undefined || value === "") return "";

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new InvalidDateError(String(value));
    }
    return formatStoreDateTime(value);
  }

  if (typeof value !== "string") return String(value);

  if (ISO_WITH_ZONE.test(value)) {
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      throw new InvalidDateError(value);
    }
    return formatStoreDateTime(parsed);
  }

  const naive = ISO_NAIVE.exec(value);
  if (naive) {
    const time = naive[3] ? naive[2] : `${naive[2]}:00`;
    return `${naive[1]} ${time}`;
  }

  return value;
}

/**
 * Reduce a date or datetime to its calendar date. Zone-qualified values are
 * read in UTC first, so "2024-03-01T23:30:00-05:00" becomes "2024-03-02";
 * anything else keeps the date as written.
 */
export function toCalendarDate(value: string | Date): string {
  if (value instanceof Date) return formatStoreDate(value);

  const trimmed = value.trim();
  if (ISO_WITH_ZONE.test(trimmed)) {
    const parsed = new Date(trimmed);
    if (!Number.isNaN(parsed.getTime())) return formatStoreDate(parsed);
  }
  return trimmed.split(/[ T]/)[0];
}
