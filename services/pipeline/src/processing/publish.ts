import { readdir, rm } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '@nyc311/shared';
import { CapabilityUnavailableError } from '../errors';
import { epochMillis, writeParquetFile, type ParquetRow, type ParquetSchemaDefinition } from '../parquet/io';
import type { CleanServiceRequest, CleanTable } from '../records';
import type { DataPaths } from '../config/settings';
import { validateCleanTable } from './validate';

export const CLEAN_SCHEMA: ParquetSchemaDefinition = {
  unique_key: { type: 'UTF8' },
  created_dt: { type: 'INT64' },
  date: { type: 'UTF8' },
  hour: { type: 'INT32' },
  day_of_week: { type: 'INT32' },
  dow_name: { type: 'UTF8' },
  month: { type: 'INT32' },
  month_name: { type: 'UTF8' },
  is_holiday: { type: 'BOOLEAN' },
  borough: { type: 'UTF8', optional: true },
  complaint_type: { type: 'UTF8', optional: true },
  descriptor: { type: 'UTF8', optional: true },
  agency: { type: 'UTF8', optional: true },
  status: { type: 'UTF8', optional: true },
  open_data_channel_type: { type: 'UTF8', optional: true },
  response_hours: { type: 'DOUBLE', optional: true },
  within_sla: { type: 'BOOLEAN', optional: true },
  latitude: { type: 'DOUBLE', optional: true },
  longitude: { type: 'DOUBLE', optional: true },
  incident_zip: { type: 'UTF8', optional: true },
  city: { type: 'UTF8' }
};

export const PARTITION_SCHEMA: ParquetSchemaDefinition = {
  ...CLEAN_SCHEMA,
  year: { type: 'INT32' }
};

const PART_FILE_PATTERN = /^part-.*\.parquet$/;

function toParquetRow(row: CleanServiceRequest, columns: readonly string[]): ParquetRow {
  const record: ParquetRow = {};
  const source: Partial<Record<string, unknown>> = { ...row };
  for (const column of columns) {
    record[column] = source[column] ?? null;
  }
  record.created_dt = epochMillis(row.created_dt);
  return record;
}

export function partitionYear(row: CleanServiceRequest): number {
  return Number.parseInt(row.date.slice(0, 4), 10);
}

/**
 * Writes the clean rows again under `<root>/<year>/<month>/`. Optional: the
 * consolidated file is the source of truth.
 */
export interface PartitionWriter {
  readonly name: string;
  writePartitions(table: CleanTable, root: string): Promise<string[]>;
}

export class ParquetPartitionWriter implements PartitionWriter {
  readonly name = 'parquet';

  async writePartitions(table: CleanTable, root: string): Promise<string[]> {
    const groups = new Map<string, { year: number; month: number; rows: ParquetRow[] }>();
    const columns = [...table.columns, 'year'];
    for (const row of table.rows) {
      const year = partitionYear(row);
      const key = `${year}/${row.month}`;
      let group = groups.get(key);
      if (!group) {
        group = { year, month: row.month, rows: [] };
        groups.set(key, group);
      }
      group.rows.push({ ...toParquetRow(row, columns), year });
    }

    const written: string[] = [];
    const ordered = [...groups.values()].sort((a, b) => a.year - b.year || a.month - b.month);
    for (const group of ordered) {
      const dir = path.join(root, String(group.year), String(group.month));
      await removeStaleParts(dir);
      const target = path.join(dir, 'part-0.parquet');
      await writeParquetFile(target, PARTITION_SCHEMA, group.rows);
      written.push(target);
    }
    return written;
  }
}

async function removeStaleParts(dir: string): Promise<void> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return;
    }
    throw err;
  }
  for (const entry of entries) {
    if (entry !== 'part-0.parquet' && PART_FILE_PATTERN.test(entry)) {
      await rm(path.join(dir, entry), { force: true });
    }
  }
}

export class DisabledPartitionWriter implements PartitionWriter {
  readonly name = 'disabled';

  constructor(private readonly reason = 'partitioned writes are turned off') {}

  async writePartitions(): Promise<string[]> {
    throw new CapabilityUnavailableError('partitioned-write', this.reason);
  }
}

export function createPartitionWriter(enabled: boolean): PartitionWriter {
  return enabled ? new ParquetPartitionWriter() : new DisabledPartitionWriter();
}

export type PublishDependencies = {
  logger: Logger;
  partitionWriter: PartitionWriter;
};

export interface PublishReport {
  cleanFile: string;
  rows: number;
  partitions: string[] | null;
}

/**
 * Validates and writes the consolidated clean file, then the partitioned
 * copy. A failed partitioned write is logged and the run keeps the
 * consolidated output.
 */
export async function publishCleanTable(
  table: CleanTable,
  paths: Pick<DataPaths, 'cleanFile' | 'partitionRoot'>,
  deps: PublishDependencies
): Promise<PublishReport> {
  const { logger } = deps;
  validateCleanTable(table);

  const rows = await writeParquetFile(
    paths.cleanFile,
    CLEAN_SCHEMA,
    table.rows.map((row) => toParquetRow(row, table.columns))
  );
  logger.info({ rows, file: paths.cleanFile }, `Wrote clean dataset (${rows} rows)`);

  let partitions: string[] | null = null;
  try {
    partitions = await deps.partitionWriter.writePartitions(table, paths.partitionRoot);
    logger.info(
      { partitions: partitions.length, root: paths.partitionRoot },
      `Wrote partitioned dataset (${partitions.length} partitions)`
    );
  } catch (err) {
    logger.warn({ err, writer: deps.partitionWriter.name }, 'Skipping partitioned write');
  }

  return { cleanFile: paths.cleanFile, rows, partitions };
}
