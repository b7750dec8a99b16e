import {
  PUBLISHED_COLUMNS,
  type CleanServiceRequest,
  type CleanTable,
  type RawServiceRequest
} from '../records';
import type { HolidayCalendar } from '../time/holidays';
import { CIVIC_TIME_ZONE, calendarFields, parseTimestamp, toCivicTime } from '../time/timestamps';

const MS_PER_HOUR = 3_600_000;

export type SlaClass = 'within' | 'breach';

/**
 * Single SLA rule for the whole pipeline: a request answered in exactly
 * `slaHours` hours is within the SLA. Unknown response time has no class.
 */
export function classifySla(hours: number | null, slaHours: number): SlaClass | null {
  if (hours === null || !Number.isFinite(hours)) {
    return null;
  }
  return hours <= slaHours ? 'within' : 'breach';
}

export function titleCase(value: string): string {
  return value.toLowerCase().replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}

function cleanText(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function cleanCity(city: string | null, borough: string | null): string {
  const source = cleanText(city) ?? cleanText(borough);
  if (source === null) {
    return 'Unknown';
  }
  return titleCase(source).trim() || 'Unknown';
}

/** Hours between creation and closure (or the last resolution update). */
export function responseHours(row: RawServiceRequest, created: Date): number | null {
  const end = parseTimestamp(row.closed_date) ?? parseTimestamp(row.resolution_action_updated_date);
  if (!end) {
    return null;
  }
  return (end.getTime() - created.getTime()) / MS_PER_HOUR;
}

export type FeatureOptions = {
  slaHours: number;
  holidays: HolidayCalendar;
  zone?: string;
};

/**
 * Turns raw pages into the published clean table. Rows without a usable
 * creation time are dropped; every other row is kept, including rows with a
 * negative response time, which validation rejects later.
 */
export function engineerFeatures(raw: readonly RawServiceRequest[], options: FeatureOptions): CleanTable {
  const zone = options.zone ?? CIVIC_TIME_ZONE;

  const located = raw.flatMap((row) => {
    const local = toCivicTime(row.created_date, zone);
    return local ? [{ row, local, fields: calendarFields(local) }] : [];
  });

  const years = new Set(located.map(({ fields }) => fields.year));
  const holidayDates = options.holidays.holidayDates(years);

  const rows = located.map(({ row, local, fields }): CleanServiceRequest => {
    const created = local.toJSDate();
    const hours = responseHours(row, created);
    const sla = classifySla(hours, options.slaHours);
    return {
      unique_key: row.unique_key,
      created_dt: created,
      date: fields.date,
      hour: fields.hour,
      day_of_week: fields.day_of_week,
      dow_name: fields.dow_name,
      month: fields.month,
      month_name: fields.month_name,
      is_holiday: holidayDates.has(fields.date),
      borough: cleanText(row.borough),
      complaint_type: cleanText(row.complaint_type),
      descriptor: cleanText(row.descriptor),
      agency: cleanText(row.agency),
      status: cleanText(row.status),
      open_data_channel_type: cleanText(row.open_data_channel_type),
      response_hours: hours,
      within_sla: sla === null ? null : sla === 'within',
      latitude: row.latitude,
      longitude: row.longitude,
      incident_zip: cleanText(row.incident_zip),
      city: cleanCity(row.city, row.borough)
    };
  });

  return { columns: PUBLISHED_COLUMNS, rows };
}
