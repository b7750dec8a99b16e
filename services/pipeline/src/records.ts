export const DATASET_FILE_PREFIX = 'nyc311';

export const TIMESTAMP_COLUMNS = ['created_date', 'closed_date', 'resolution_action_updated_date'] as const;
export const COORDINATE_COLUMNS = ['latitude', 'longitude'] as const;
export const TEXT_COLUMNS = [
  'agency',
  'complaint_type',
  'descriptor',
  'status',
  'borough',
  'incident_zip',
  'city',
  'open_data_channel_type'
] as const;

/** Columns requested from the API, in request order. */
export const SELECT_COLUMNS = [
  'unique_key',
  'created_date',
  'closed_date',
  'resolution_action_updated_date',
  'agency',
  'complaint_type',
  'descriptor',
  'status',
  'borough',
  'incident_zip',
  'city',
  'open_data_channel_type',
  'latitude',
  'longitude'
] as const;

export type TimestampColumn = (typeof TIMESTAMP_COLUMNS)[number];
export type CoordinateColumn = (typeof COORDINATE_COLUMNS)[number];
export type TextColumn = (typeof TEXT_COLUMNS)[number];

/**
 * Timestamps are instants once a page has been written. Tables built by hand
 * may still carry ISO strings; strings without an offset are read as UTC.
 */
export type RawTimestamp = Date | string | null;

export type RawServiceRequest = {
  unique_key: string | null;
} & Record<TimestampColumn, RawTimestamp> &
  Record<TextColumn, string | null> &
  Record<CoordinateColumn, number | null>;

export type DayName = 'Monday' | 'Tuesday' | 'Wednesday' | 'Thursday' | 'Friday' | 'Saturday' | 'Sunday';

export interface CleanServiceRequest {
  unique_key: string | null;
  created_dt: Date;
  date: string;
  hour: number;
  day_of_week: number;
  dow_name: DayName;
  month: number;
  month_name: string;
  is_holiday: boolean;
  borough: string | null;
  complaint_type: string | null;
  descriptor: string | null;
  agency: string | null;
  status: string | null;
  open_data_channel_type: string | null;
  response_hours: number | null;
  within_sla: boolean | null;
  latitude: number | null;
  longitude: number | null;
  incident_zip: string | null;
  city: string;
}

export type CleanColumn = keyof CleanServiceRequest;

/** Published column order. */
export const PUBLISHED_COLUMNS: readonly CleanColumn[] = [
  'unique_key',
  'created_dt',
  'date',
  'hour',
  'day_of_week',
  'dow_name',
  'month',
  'month_name',
  'is_holiday',
  'borough',
  'complaint_type',
  'descriptor',
  'agency',
  'status',
  'open_data_channel_type',
  'response_hours',
  'within_sla',
  'latitude',
  'longitude',
  'incident_zip',
  'city'
];

export const REQUIRED_COLUMNS: readonly string[] = [
  'unique_key',
  'created_dt',
  'borough',
  'complaint_type',
  'descriptor',
  'response_hours',
  'within_sla',
  'hour',
  'dow_name',
  'month_name'
];

export interface CleanTable {
  columns: readonly string[];
  rows: CleanServiceRequest[];
}
