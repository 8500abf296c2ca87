/**
 * Calendar Day Helpers
 *
 * Traffic is keyed by UTC calendar day. GitHub reports each day as a
 * midnight timestamp ("2024-01-02T00:00:00Z"); history rows store the
 * bare day ("2024-01-02").
 */

const DAY_MS = 24 * 60 * 60 * 1000;
const CALENDAR_DAY = /^(\d{4})-(\d{2})-(\d{2})(?:T.*)?$/;
const BARE_DAY = /^\d{4}-\d{2}-\d{2}$/;

/** Length of the lookback GitHub exposes for traffic. */
export const TRAFFIC_WINDOW_DAYS = 14;

/**
 * Reduce a timestamp or day string to YYYY-MM-DD.
 * Returns null when the input is not a real calendar day.
 */
export function toCalendarDay(value: string): string | null {
  const match = CALENDAR_DAY.exec(value.trim());
  if (!match) return null;

  const [, year, month, day] = match;
  const parsed = new Date(`${year}-${month}-${day}T00:00:00Z`);
  if (isNaN(parsed.getTime())) return null;

  const normalized = parsed.toISOString().slice(0, 10);
  // Rejects rollovers such as 2024-02-30 → 2024-03-01
  return normalized === `${year}-${month}-${day}` ? normalized : null;
}

/**
 * True only for an exact YYYY-MM-DD that names a real day. Stored rows must
 * match this; anything looser could alias another row's date.
 */
export function isCalendarDay(value: string): boolean {
  return BARE_DAY.test(value) && toCalendarDay(value) === value;
}

/** UTC calendar day of an instant. */
export function calendarDayOf(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

/**
 * First day of the trailing window that ends on `now`'s UTC day.
 * The window covers TRAFFIC_WINDOW_DAYS days including today.
 */
export function trailingWindowStart(now: Date): string {
  const start = new Date(now.getTime() - (TRAFFIC_WINDOW_DAYS - 1) * DAY_MS);
  return calendarDayOf(start);
}
