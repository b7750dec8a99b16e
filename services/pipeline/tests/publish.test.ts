import assert from 'node:assert/strict';
import { access, mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';
import { resolveDataPaths } from '../src/config/settings';
import { CapabilityUnavailableError, SchemaError } from '../src/errors';
import { readDate, readNumber, readParquetFile, readString } from '../src/parquet/io';
import { engineerFeatures } from '../src/processing/features';
import { DisabledPartitionWriter, ParquetPartitionWriter, publishCleanTable } from '../src/processing/publish';
import { DisabledHolidayCalendar } from '../src/time/holidays';
import { createTempDir, createTestLogger, rawRequest } from './helpers';

function sampleTable() {
  return engineerFeatures(
    [
      rawRequest({ unique_key: '1', created_date: '2024-01-01T00:00:00Z', closed_date: '2024-01-01T06:00:00Z' }),
      rawRequest({ unique_key: '2', created_date: '2024-01-20T15:00:00Z' }),
      rawRequest({ unique_key: '3', created_date: '2024-02-02T15:00:00Z', closed_date: '2024-02-04T15:00:00Z' })
    ],
    { slaHours: 24, holidays: new DisabledHolidayCalendar() }
  );
}

test('republishing the same input produces byte-identical output', async (t) => {
  const root = await createTempDir(t);
  const paths = resolveDataPaths(root);
  const { logger } = createTestLogger();
  const deps = { logger, partitionWriter: new ParquetPartitionWriter() };

  const snapshot = async (partitions: string[]) =>
    Promise.all([paths.cleanFile, ...partitions].map((file) => readFile(file)));

  const first = await publishCleanTable(sampleTable(), paths, deps);
  const firstFiles = await snapshot(first.partitions ?? []);
  const second = await publishCleanTable(sampleTable(), paths, deps);
  const secondFiles = await snapshot(second.partitions ?? []);

  assert.deepEqual(second.partitions, first.partitions);
  assert.equal(firstFiles.length, 4);
  firstFiles.forEach((contents, index) => {
    assert.ok(contents.equals(secondFiles[index]));
  });
});

test('the consolidated file holds the clean rows', async (t) => {
  const root = await createTempDir(t);
  const paths = resolveDataPaths(root);
  const { logger } = createTestLogger();

  const report = await publishCleanTable(sampleTable(), paths, {
    logger,
    partitionWriter: new ParquetPartitionWriter()
  });
  const rows = await readParquetFile(paths.cleanFile);

  assert.equal(report.rows, 3);
  assert.deepEqual(
    rows.map((row) => readString(row, 'unique_key')),
    ['1', '2', '3']
  );
  assert.equal(readString(rows[0], 'date'), '2023-12-31');
  assert.equal(readNumber(rows[0], 'hour'), 19);
  assert.deepEqual(readDate(rows[0], 'created_dt'), new Date('2024-01-01T00:00:00.000Z'));
  assert.equal(readNumber(rows[0], 'response_hours'), 6);
  assert.equal(readNumber(rows[1], 'response_hours'), null);
  assert.equal(readNumber(rows[2], 'response_hours'), 48);
});

test('partitions follow the local year and month', async (t) => {
  const root = await createTempDir(t);
  const paths = resolveDataPaths(root);
  const { logger } = createTestLogger();

  await mkdir(path.join(paths.partitionRoot, '2024', '1'), { recursive: true });
  await writeFile(path.join(paths.partitionRoot, '2024', '1', 'part-1.parquet'), 'stale');
  await mkdir(path.join(paths.partitionRoot, '2022', '5'), { recursive: true });
  await writeFile(path.join(paths.partitionRoot, '2022', '5', 'part-0.parquet'), 'untouched');

  const report = await publishCleanTable(sampleTable(), paths, {
    logger,
    partitionWriter: new ParquetPartitionWriter()
  });

  assert.deepEqual(report.partitions, [
    path.join(paths.partitionRoot, '2023', '12', 'part-0.parquet'),
    path.join(paths.partitionRoot, '2024', '1', 'part-0.parquet'),
    path.join(paths.partitionRoot, '2024', '2', 'part-0.parquet')
  ]);
  assert.deepEqual(await readdir(path.join(paths.partitionRoot, '2024', '1')), ['part-0.parquet']);
  await access(path.join(paths.partitionRoot, '2022', '5', 'part-0.parquet'));

  const january = await readParquetFile(path.join(paths.partitionRoot, '2024', '1', 'part-0.parquet'));
  assert.deepEqual(
    january.map((row) => [readString(row, 'unique_key'), readNumber(row, 'year'), readNumber(row, 'month')]),
    [['2', 2024, 1]]
  );
});

test('a failed partitioned write leaves the consolidated file and logs a warning', async (t) => {
  const root = await createTempDir(t);
  const paths = resolveDataPaths(root);
  const { logger, at } = createTestLogger();

  const report = await publishCleanTable(sampleTable(), paths, {
    logger,
    partitionWriter: new DisabledPartitionWriter()
  });

  assert.equal(report.partitions, null);
  await access(paths.cleanFile);
  const warnings = at('warn');
  assert.deepEqual(
    warnings.map((entry) => entry.msg),
    ['Skipping partitioned write']
  );
  await assert.rejects(access(paths.partitionRoot));
});

test('the disabled writer reports the capability as unavailable', async () => {
  await assert.rejects(
    new DisabledPartitionWriter().writePartitions(),
    (err: unknown) =>
      err instanceof CapabilityUnavailableError &&
      err.capability === 'partitioned-write' &&
      err.message === 'partitioned-write unavailable: partitioned writes are turned off'
  );
});

test('invalid tables are never written', async (t) => {
  const root = await createTempDir(t);
  const paths = resolveDataPaths(root);
  const { logger } = createTestLogger();
  const table = sampleTable();
  table.rows[1].unique_key = '1';

  await assert.rejects(
    publishCleanTable(table, paths, { logger, partitionWriter: new ParquetPartitionWriter() }),
    SchemaError
  );
  await assert.rejects(access(paths.cleanFile));
});
