const OFFSET_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const SPACE_SEPARATOR = /^(\d{4}-\d{2}-\d{2})\s+(?=\d)/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Coerce a timestamp to a single UTC-based representation.
 * Strings without an offset ("2026-03-01T09:30:00", or the CSV form
 * "2026-03-01 09:30:00") are read as UTC rather than local time, so every
 * event compares on the same clock.
 */
export function toDate(value: string | Date): Date {
  if (value instanceof Date) return new Date(value.getTime());
  const trimmed = value.trim().replace(SPACE_SEPARATOR, '$1T');
  if (trimmed.includes('T') && !OFFSET_SUFFIX.test(trimmed)) {
    return new Date(`${trimmed}Z`);
  }
  return new Date(trimmed);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Whole days from `from` to `to`, truncated toward zero. */
export function daysBetween(from: Date, to: Date): number {
  return Math.trunc((to.getTime() - from.getTime()) / DAY_MS);
}

