import { DateTime } from 'luxon';
import type { DayName, RawTimestamp } from '../records';

export const CIVIC_TIME_ZONE = 'America/New_York';

const DAY_NAMES: readonly DayName[] = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

/**
 * Parses an API timestamp. Strings without an offset are taken as UTC;
 * strings with `Z` or an offset keep it. Unparseable input yields null.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const parsed = DateTime.fromISO(trimmed, { zone: 'utc' });
  return parsed.isValid ? parsed.toJSDate() : null;
}

/**
 * Moves a creation timestamp into the civic time zone. Naive values are
 * first pinned to UTC, then converted; zoned values are converted directly.
 */
export function toCivicTime(value: RawTimestamp, zone: string = CIVIC_TIME_ZONE): DateTime | null {
  const instant = parseTimestamp(value);
  if (!instant) {
    return null;
  }
  return DateTime.fromJSDate(instant, { zone: 'utc' }).setZone(zone).setLocale('en-US');
}

export type CalendarFields = {
  date: string;
  year: number;
  hour: number;
  day_of_week: number;
  dow_name: DayName;
  month: number;
  month_name: string;
};

export function calendarFields(local: DateTime): CalendarFields {
  const dayOfWeek = local.weekday - 1;
  return {
    date: local.toFormat('yyyy-MM-dd'),
    year: local.year,
    hour: local.hour,
    day_of_week: dayOfWeek,
    dow_name: DAY_NAMES[dayOfWeek],
    month: local.month,
    month_name: local.toFormat('LLLL')
  };
}

/** Start of the civic-local day that contains `now`. */
export function civicDate(now: Date, zone: string = CIVIC_TIME_ZONE): DateTime {
  return DateTime.fromJSDate(now, { zone }).startOf('day');
}
