import Holidays from 'date-holidays';
import type { Logger } from '@nyc311/shared';

export interface HolidayCalendar {
  readonly name: string;
  /** Public holiday dates (`YYYY-MM-DD`, civic-local) for every requested year. */
  holidayDates(years: Iterable<number>): Set<string>;
}

/**
 * New York State public holidays, observed days included.
 */
export class NewYorkHolidayCalendar implements HolidayCalendar {
  readonly name = 'US-NY';
  private readonly holidays = new Holidays('US', 'NY');
  private readonly cache = new Map<number, string[]>();

  holidayDates(years: Iterable<number>): Set<string> {
    const dates = new Set<string>();
    for (const year of years) {
      for (const date of this.forYear(year)) {
        dates.add(date);
      }
    }
    return dates;
  }

  private forYear(year: number): string[] {
    const cached = this.cache.get(year);
    if (cached) {
      return cached;
    }
    const entries = this.holidays
      .getHolidays(year)
      .filter((holiday) => holiday.type === 'public')
      .map((holiday) => holiday.date.slice(0, 10));
    this.cache.set(year, entries);
    return entries;
  }
}

export class DisabledHolidayCalendar implements HolidayCalendar {
  readonly name = 'disabled';

  holidayDates(): Set<string> {
    return new Set();
  }
}

export function createHolidayCalendar(enabled: boolean, logger?: Logger): HolidayCalendar {
  if (!enabled) {
    logger?.warn('Holiday calendar disabled; is_holiday will be false for every row');
    return new DisabledHolidayCalendar();
  }
  return new NewYorkHolidayCalendar();
}
