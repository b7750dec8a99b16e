import { mkdir, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import {
  ParquetReader,
  ParquetSchema,
  ParquetWriter,
  type ParquetRow,
  type ParquetSchemaDefinition
} from 'parquetjs-lite';

export type { ParquetRow, ParquetSchemaDefinition };

function compactRow(row: ParquetRow): ParquetRow {
  const compacted: ParquetRow = {};
  for (const [key, value] of Object.entries(row)) {
    if (value !== null && value !== undefined) {
      compacted[key] = value;
    }
  }
  return compacted;
}

/**
 * Writes rows next to the target and renames over it once the footer is
 * flushed, so readers never see a half-written file.
 */
export async function writeParquetFile(
  targetPath: string,
  definition: ParquetSchemaDefinition,
  rows: Iterable<ParquetRow>
): Promise<number> {
  await mkdir(path.dirname(targetPath), { recursive: true });
  const partialPath = `${targetPath}.partial`;
  const writer = await ParquetWriter.openFile(new ParquetSchema(definition), partialPath);
  let written = 0;
  try {
    for (const row of rows) {
      await writer.appendRow(compactRow(row));
      written += 1;
    }
  } catch (err) {
    await writer.close().catch(() => undefined);
    await rm(partialPath, { force: true });
    throw err;
  }
  await writer.close();
  await rename(partialPath, targetPath);
  return written;
}

export async function readParquetFile(filePath: string): Promise<ParquetRow[]> {
  const reader = await ParquetReader.openFile(filePath);
  try {
    const cursor = reader.getCursor();
    const rows: ParquetRow[] = [];
    for (let row = await cursor.next(); row; row = await cursor.next()) {
      rows.push(row);
    }
    return rows;
  } finally {
    await reader.close();
  }
}

export function readString(row: ParquetRow, key: string): string | null {
  const value = row[key];
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return null;
}

export function readNumber(row: ParquetRow, key: string): number | null {
  const value = row[key];
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return null;
}

/**
 * Instants are stored as plain INT64 epoch milliseconds; the reader hands
 * INT64 values back as `bigint`.
 */
export function epochMillis(value: Date | null): number | null {
  return value === null ? null : value.getTime();
}

export function readDate(row: ParquetRow, key: string): Date | null {
  const value = row[key];
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'bigint') {
    return new Date(Number(value));
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Date(value) : null;
  }
  return null;
}
