import { access, readdir } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '@nyc311/shared';
import type { SummariesSettings } from '../config/settings';
import { ConfigurationError } from '../errors';
import {
  readNumber,
  readParquetFile,
  readString,
  writeParquetFile,
  type ParquetRow,
  type ParquetSchemaDefinition
} from '../parquet/io';
import { buildSummaries, type SummaryInputRow } from './aggregate';

const STATS_FIELDS: ParquetSchemaDefinition = {
  tickets: { type: 'INT32' },
  sla_eligible: { type: 'INT32' },
  median_response: { type: 'DOUBLE', optional: true }
};

export const DAILY_SUMMARY_SCHEMA: ParquetSchemaDefinition = {
  date: { type: 'UTF8' },
  borough: { type: 'UTF8', optional: true },
  complaint_type: { type: 'UTF8', optional: true },
  ...STATS_FIELDS,
  pct_within: { type: 'DOUBLE', optional: true }
};

export const COMPLAINT_TYPE_SUMMARY_SCHEMA: ParquetSchemaDefinition = {
  complaint_type: { type: 'UTF8', optional: true },
  borough: { type: 'UTF8', optional: true },
  ...STATS_FIELDS,
  breach_rate: { type: 'DOUBLE', optional: true }
};

export const DOW_HOUR_SUMMARY_SCHEMA: ParquetSchemaDefinition = {
  dow_name: { type: 'UTF8' },
  hour: { type: 'INT32' },
  borough: { type: 'UTF8', optional: true },
  complaint_type: { type: 'UTF8', optional: true },
  ...STATS_FIELDS,
  breach_rate: { type: 'DOUBLE', optional: true }
};

export const SUMMARY_FILES = {
  daily: 'daily_summary.parquet',
  complaintType: 'complaint_type_summary.parquet',
  dowHour: 'dow_hour_summary.parquet'
} as const;

const PART_FILE_PATTERN = /^part-.*\.parquet$/;

async function listDirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return [];
    }
    throw err;
  }
}

/** `<root>/<year>/<month>/part-*.parquet`, in path order. */
export async function listPartitionFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  for (const year of await listDirectories(root)) {
    for (const month of await listDirectories(path.join(root, year))) {
      const dir = path.join(root, year, month);
      const parts = (await readdir(dir)).filter((entry) => PART_FILE_PATTERN.test(entry)).sort();
      files.push(...parts.map((part) => path.join(dir, part)));
    }
  }
  return files;
}

export function toSummaryInput(row: ParquetRow): SummaryInputRow | null {
  const date = readString(row, 'date');
  const dowName = readString(row, 'dow_name');
  const hour = readNumber(row, 'hour');
  if (date === null || dowName === null || hour === null) {
    return null;
  }
  return {
    date,
    dow_name: dowName,
    hour,
    borough: readString(row, 'borough'),
    complaint_type: readString(row, 'complaint_type'),
    response_hours: readNumber(row, 'response_hours')
  };
}

async function readInputs(files: readonly string[]): Promise<SummaryInputRow[]> {
  const rows: SummaryInputRow[] = [];
  for (const file of files) {
    for (const row of await readParquetFile(file)) {
      const input = toSummaryInput(row);
      if (input) {
        rows.push(input);
      }
    }
  }
  return rows;
}

export interface SummariesReport {
  source: 'partitions' | 'consolidated';
  inputRows: number;
  files: Record<keyof typeof SUMMARY_FILES, { path: string; rows: number }>;
}

export async function runSummaries(
  settings: SummariesSettings,
  deps: { logger: Logger }
): Promise<SummariesReport> {
  const { logger } = deps;
  let source: SummariesReport['source'] = 'partitions';
  let files = await listPartitionFiles(settings.paths.partitionRoot);
  if (files.length === 0) {
    logger.warn(
      { partitionRoot: settings.paths.partitionRoot, cleanFile: settings.paths.cleanFile },
      'No partitioned dataset found; reading the consolidated clean file'
    );
    try {
      await access(settings.paths.cleanFile);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new ConfigurationError(`Clean dataset not found: ${settings.paths.cleanFile}`);
      }
      throw err;
    }
    source = 'consolidated';
    files = [settings.paths.cleanFile];
  }

  const inputs = await readInputs(files);
  logger.info({ rows: inputs.length, source, slaHours: settings.slaHours }, 'Computing summaries');
  const tables = buildSummaries(inputs, settings.slaHours);

  const targets = {
    daily: path.join(settings.outDir, SUMMARY_FILES.daily),
    complaintType: path.join(settings.outDir, SUMMARY_FILES.complaintType),
    dowHour: path.join(settings.outDir, SUMMARY_FILES.dowHour)
  };
  const report: SummariesReport = {
    source,
    inputRows: inputs.length,
    files: {
      daily: { path: targets.daily, rows: await writeParquetFile(targets.daily, DAILY_SUMMARY_SCHEMA, tables.daily) },
      complaintType: {
        path: targets.complaintType,
        rows: await writeParquetFile(targets.complaintType, COMPLAINT_TYPE_SUMMARY_SCHEMA, tables.complaintType)
      },
      dowHour: {
        path: targets.dowHour,
        rows: await writeParquetFile(targets.dowHour, DOW_HOUR_SUMMARY_SCHEMA, tables.dowHour)
      }
    }
  };
  for (const entry of Object.values(report.files)) {
    logger.info({ file: entry.path, rows: entry.rows }, `Wrote ${path.basename(entry.path)} (${entry.rows} rows)`);
  }
  return report;
}
