/**
 * Timestamp formatting shared by the logger and the result summary.
 *
 * Output is `YYYY-MM-DD HH:MM:SS <zone>`, the layout downstream log scrapers
 * expect. The zone is the short name `Intl` reports (e.g. "UTC", "EST",
 * "GMT+2").
 */

/** True when `Intl` accepts `timeZone` as an IANA zone name. */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Formats `date` in local time, or in `timeZone` (an IANA name) when given.
 * Throws a `RangeError` for a zone `Intl` does not know.
 */
export function formatTimestamp(date: Date, timeZone?: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
    timeZoneName: 'short',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')} ` +
    `${part('hour')}:${part('minute')}:${part('second')} ${part('timeZoneName')}`;
}
