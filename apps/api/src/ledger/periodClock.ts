import type { CalendarDate, PeriodBoundaries } from '@tokenboard/shared';

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function toCalendarDate(year: number, month: number, day: number): CalendarDate {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Year, month (1-12) and day of `now` as seen on a wall clock in `timeZone`
 */
export function calendarParts(now: Date, timeZone: string): { year: number; month: number; day: number } {
  const parts = formatterFor(timeZone).formatToParts(now);
  const pick = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? Number(part.value) : NaN;
  };
  return { year: pick('year'), month: pick('month'), day: pick('day') };
}

/**
 * Start-of-day, start-of-week (Monday) and start-of-month dates for `now` in
 * the ledger's reference time zone. Pure; boundaries are calendar dates so
 * they compare correctly as strings.
 */
export function getPeriodBoundaries(now: Date, timeZone: string): PeriodBoundaries {
  const { year, month, day } = calendarParts(now, timeZone);

  // Date arithmetic in UTC on the wall-clock date; no DST involved
  const date = new Date(Date.UTC(year, month - 1, day));
  const daysSinceMonday = (date.getUTCDay() + 6) % 7; // 0=Mon
  date.setUTCDate(date.getUTCDate() - daysSinceMonday);

  return {
    day: toCalendarDate(year, month, day),
    week: toCalendarDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate()),
    month: toCalendarDate(year, month, 1),
  };
}
