import path from 'node:path';
import { z } from 'zod';
import {
  COORDINATE_COLUMNS,
  DATASET_FILE_PREFIX,
  TEXT_COLUMNS,
  TIMESTAMP_COLUMNS,
  type RawServiceRequest
} from '../records';
import { IngestionError } from '../errors';
import { parseTimestamp } from '../time/timestamps';
import { epochMillis, writeParquetFile, type ParquetRow, type ParquetSchemaDefinition } from '../parquet/io';

const PAGE_FILE_PATTERN = new RegExp(`^${DATASET_FILE_PREFIX}_(\\d{4}-\\d{2}-\\d{2})_(\\d{5,})\\.parquet$`);

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]).nullish();

/** SODA returns every column as a string; absent columns are omitted. */
export const sodaRowSchema = z.object({
  unique_key: scalarSchema,
  created_date: scalarSchema,
  closed_date: scalarSchema,
  resolution_action_updated_date: scalarSchema,
  agency: scalarSchema,
  complaint_type: scalarSchema,
  descriptor: scalarSchema,
  status: scalarSchema,
  borough: scalarSchema,
  incident_zip: scalarSchema,
  city: scalarSchema,
  open_data_channel_type: scalarSchema,
  latitude: scalarSchema,
  longitude: scalarSchema
});

export type SodaServiceRequestRow = z.infer<typeof sodaRowSchema>;

export const RAW_PAGE_SCHEMA: ParquetSchemaDefinition = {
  unique_key: { type: 'UTF8', optional: true },
  created_date: { type: 'INT64', optional: true },
  closed_date: { type: 'INT64', optional: true },
  resolution_action_updated_date: { type: 'INT64', optional: true },
  agency: { type: 'UTF8', optional: true },
  complaint_type: { type: 'UTF8', optional: true },
  descriptor: { type: 'UTF8', optional: true },
  status: { type: 'UTF8', optional: true },
  borough: { type: 'UTF8', optional: true },
  incident_zip: { type: 'UTF8', optional: true },
  city: { type: 'UTF8', optional: true },
  open_data_channel_type: { type: 'UTF8', optional: true },
  latitude: { type: 'DOUBLE', optional: true },
  longitude: { type: 'DOUBLE', optional: true }
};

export function pageFileName(sinceDate: string, pageIndex: number): string {
  return `${DATASET_FILE_PREFIX}_${sinceDate}_${String(pageIndex).padStart(5, '0')}.parquet`;
}

export function parsePageFileName(fileName: string): { sinceDate: string; pageIndex: number } | null {
  const match = PAGE_FILE_PATTERN.exec(fileName);
  if (!match) {
    return null;
  }
  return { sinceDate: match[1], pageIndex: Number.parseInt(match[2], 10) };
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.length > 0 ? value : null;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

function toCoordinate(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Applies write-time typing to one API row. Bad timestamps and coordinates
 * become null instead of failing the page.
 */
export function normalizeSodaRow(row: SodaServiceRequestRow): RawServiceRequest {
  const record: RawServiceRequest = {
    unique_key: toText(row.unique_key),
    created_date: null,
    closed_date: null,
    resolution_action_updated_date: null,
    agency: null,
    complaint_type: null,
    descriptor: null,
    status: null,
    borough: null,
    incident_zip: null,
    city: null,
    open_data_channel_type: null,
    latitude: null,
    longitude: null
  };
  for (const column of TIMESTAMP_COLUMNS) {
    record[column] = parseTimestamp(row[column]);
  }
  for (const column of TEXT_COLUMNS) {
    record[column] = toText(row[column]);
  }
  for (const column of COORDINATE_COLUMNS) {
    record[column] = toCoordinate(row[column]);
  }
  return record;
}

export function normalizeSodaPage(rows: unknown[], offset: number): RawServiceRequest[] {
  const parsed = z.array(sodaRowSchema).safeParse(rows);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new IngestionError(
      `Page at offset ${offset} has an unexpected shape: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`,
      { attempts: 1, cause: parsed.error }
    );
  }
  return parsed.data.map(normalizeSodaRow);
}

export interface PageArtifact {
  pageIndex: number;
  fileName: string;
  filePath: string;
  rows: number;
  written: boolean;
}

/**
 * Destination for fetched pages. Pages are immutable once handed over.
 */
export interface PageSink {
  writePage(fileName: string, rows: RawServiceRequest[]): Promise<string>;
}

export function toPageRow(row: RawServiceRequest): ParquetRow {
  const record: ParquetRow = { ...row };
  for (const column of TIMESTAMP_COLUMNS) {
    record[column] = epochMillis(parseTimestamp(row[column]));
  }
  return record;
}

export class ParquetPageSink implements PageSink {
  constructor(private readonly outDir: string) {}

  async writePage(fileName: string, rows: RawServiceRequest[]): Promise<string> {
    const filePath = path.join(this.outDir, fileName);
    await writeParquetFile(filePath, RAW_PAGE_SCHEMA, rows.map(toPageRow));
    return filePath;
  }
}
