import { readdir } from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationError } from '../errors';
import { parsePageFileName } from '../ingestion/pages';
import { readDate, readNumber, readParquetFile, readString, type ParquetRow } from '../parquet/io';
import { COORDINATE_COLUMNS, TEXT_COLUMNS, TIMESTAMP_COLUMNS, type RawServiceRequest } from '../records';

function isMissingDirectory(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/** Page files in `rawDir`, ordered by file name. */
export async function listRawPages(rawDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(rawDir);
  } catch (err) {
    if (isMissingDirectory(err)) {
      throw new ConfigurationError(`Raw directory not found: ${rawDir}`);
    }
    throw err;
  }
  return entries
    .filter((entry) => parsePageFileName(entry) !== null)
    .sort()
    .map((entry) => path.join(rawDir, entry));
}

export function toRawServiceRequest(row: ParquetRow): RawServiceRequest {
  const record: RawServiceRequest = {
    unique_key: readString(row, 'unique_key'),
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
    record[column] = readDate(row, column);
  }
  for (const column of TEXT_COLUMNS) {
    record[column] = readString(row, column);
  }
  for (const column of COORDINATE_COLUMNS) {
    record[column] = readNumber(row, column);
  }
  return record;
}

/**
 * Concatenates every raw page in the directory. Fails when the directory is
 * missing or holds no pages.
 */
export async function loadRawTable(rawDir: string): Promise<RawServiceRequest[]> {
  const files = await listRawPages(rawDir);
  if (files.length === 0) {
    throw new ConfigurationError(`No raw page files found in ${rawDir}`);
  }
  const rows: RawServiceRequest[] = [];
  for (const file of files) {
    for (const row of await readParquetFile(file)) {
      rows.push(toRawServiceRequest(row));
    }
  }
  return rows;
}
