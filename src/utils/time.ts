import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';
import type { DayName } from '../types/index.js';

dayjs.extend(utc);
dayjs.extend(timezone);

export const DEFAULT_TIMEZONE = 'Asia/Kolkata';

// Canonical order for weekly views
export const WEEKDAYS: readonly DayName[] = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday'
];

const BY_DAYJS_INDEX: readonly DayName[] = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday'
];

function at(date: Date | string, tz: string): dayjs.Dayjs {
  return typeof date === 'string' ? dayjs.tz(date, tz) : dayjs(date).tz(tz);
}

/** Calendar date (YYYY-MM-DD) of `date` as seen in `tz`. */
export function toISODate(date: Date | string, tz = DEFAULT_TIMEZONE): string {
  const d = at(date, tz);
  if (!d.isValid()) throw new RangeError(`Invalid date: ${String(date)}`);
  return d.format('YYYY-MM-DD');
}

export function getDayName(isoDate: string, tz = DEFAULT_TIMEZONE): DayName {
  const name = BY_DAYJS_INDEX[at(isoDate, tz).day()];
  if (!name) throw new RangeError(`Invalid date: ${isoDate}`);
  return name;
}

export function addDays(isoDate: string, days: number, tz = DEFAULT_TIMEZONE): string {
  return at(isoDate, tz).add(days, 'day').format('YYYY-MM-DD');
}

/** Most recent date on or before `today` that falls on `day`. */
export function lastDateFor(day: DayName, today: string, tz = DEFAULT_TIMEZONE): string {
  for (let back = 0; back < 7; back++) {
    const date = addDays(today, -back, tz);
    if (getDayName(date, tz) === day) return date;
  }
  return today;
}

export function weekdayOrder(day: DayName): number {
  return WEEKDAYS.indexOf(day);
}
