import { DateTime } from 'luxon';

/** Source of "now". Controllers take one so tests can pin time. */
export type Clock = () => DateTime;

export const utcClock: Clock = () => DateTime.utc();

/**
 * UTC ISO string for a DateTime, e.g. `2026-10-19T08:00:00.000Z`.
 * @throws Error if the DateTime is invalid
 */
export function toIso(dt: DateTime): string {
  const iso = dt.toUTC().toISO();
  if (iso === null) throw new Error(`Invalid DateTime: ${dt.invalidReason ?? 'unknown reason'}`);
  return iso;
}

/** Whole unix seconds as a string, the format run documents store. */
export function unixSeconds(dt: DateTime): string {
  return String(Math.floor(dt.toSeconds()));
}

/** Calendar day in UTC, `yyyy-MM-dd`. */
export function isoDay(dt: DateTime): string {
  return dt.toUTC().toFormat('yyyy-MM-dd');
}
