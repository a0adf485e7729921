/**
 * Shared time utilities for consistent time display across the bot.
 * Voice sessions and analytics are stored and computed in whole epoch seconds.
 */

export const SECONDS_PER_DAY = 86400;

/**
 * Current time in whole epoch seconds.
 * Capture it once per request and pass it down.
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Formats a duration in seconds as hours and minutes.
 *
 * @example
 * formatHoursMinutes(3600) // "1h 0m"
 * formatHoursMinutes(1500) // "0h 25m"
 */
export function formatHoursMinutes(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return `${hours}h ${minutes}m`;
}

/**
 * Formats seconds to a single compact unit for chart labels.
 *
 * @example
 * formatCompact(9000) // "2.5h"
 * formatCompact(2700) // "45m"
 */
export function formatCompact(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const totalMinutes = Math.floor(total / 60);
  const totalHours = totalMinutes / 60;
  const totalDays = totalHours / 24;

  if (totalDays >= 1) {
    return `${totalDays.toFixed(1)}d`;
  } else if (totalHours >= 1) {
    return `${totalHours.toFixed(1)}h`;
  } else if (totalMinutes >= 1) {
    return `${totalMinutes}m`;
  }
  return `${total}s`;
}

/**
 * Format epoch seconds as "YYYY-MM-DD HH:mm" in a zone.
 * Unknown zones fall back to UTC with a " UTC" suffix.
 */
export function formatLocalTimestamp(ts: number, timezone: string): string {
  const date = new Date(ts * 1000);
  try {
    return formatInZone(date, timezone);
  } catch {
    return `${formatInZone(date, 'UTC')} UTC`;
  }
}

function formatInZone(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
  }).formatToParts(date);

  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? '00';

  const hour = get('hour') === '24' ? '00' : get('hour');
  return `${get('year')}-${get('month')}-${get('day')} ${hour}:${get('minute')}`;
}

/**
 * Window start for "last N days" relative to now
 */
export function sinceDaysAgo(now: number, days: number): number {
  return now - days * SECONDS_PER_DAY;
}
