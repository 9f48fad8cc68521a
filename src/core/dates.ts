import { DateTime } from "luxon";

// Canonical grammars accepted from operators.
export const DATE_FORMAT = "dd/MM/yyyy";
export const DATETIME_FORMAT = "dd/MM/yyyy HH:mm";

const DATE_INPUT = "d/M/yyyy";
const DATETIME_INPUT = "d/M/yyyy H:mm";

/** Parses DD/MM/YYYY into an ISO calendar day (yyyy-MM-dd), or null. */
export function parseCalendarDate(input: string): string | null {
  const dt = DateTime.fromFormat(input.trim(), DATE_INPUT, { zone: "utc" });
  return dt.isValid ? dt.toISODate() : null;
}

/** Parses DD/MM/YYYY HH:MM as wall-clock time in `zone`. */
export function parseLocalDateTime(input: string, zone: string): Date | null {
  const dt = DateTime.fromFormat(input.trim(), DATETIME_INPUT, { zone });
  return dt.isValid ? dt.toJSDate() : null;
}

export function isIsoCalendarDay(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && DateTime.fromISO(value, { zone: "utc" }).isValid;
}

export function formatCalendarDate(isoDay: string): string {
  const dt = DateTime.fromISO(isoDay, { zone: "utc" });
  return dt.isValid ? dt.toFormat(DATE_FORMAT) : isoDay;
}

export function formatDateTime(at: Date | string, zone: string): string {
  const dt = typeof at === "string" ? DateTime.fromISO(at) : DateTime.fromJSDate(at);
  return dt.setZone(zone).toFormat(DATETIME_FORMAT);
}

/** The calendar day `now` falls on in `zone`, as yyyy-MM-dd. */
export function calendarDayIn(zone: string, now: Date): string {
  const day = DateTime.fromJSDate(now).setZone(zone).toISODate();
  if (!day) throw new Error(`Invalid time zone: ${zone}`);
  return day;
}

/** Whole calendar days from `fromDay` to `toDay`; negative when `toDay` is earlier. */
export function daysBetween(fromDay: string, toDay: string): number {
  const from = DateTime.fromISO(fromDay, { zone: "utc" });
  const to = DateTime.fromISO(toDay, { zone: "utc" });
  if (!from.isValid || !to.isValid) throw new Error(`Invalid calendar day: ${from.isValid ? toDay : fromDay}`);
  return Math.round(to.diff(from, "days").days);
}
