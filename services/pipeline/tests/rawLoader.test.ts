import assert from 'node:assert/strict';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';
import { ConfigurationError } from '../src/errors';
import { listRawPages, loadRawTable } from '../src/processing/rawLoader';
import { createTempDir } from './helpers';

test('an empty raw directory is a configuration error', async (t) => {
  const dir = await createTempDir(t);
  await writeFile(path.join(dir, 'notes.txt'), 'not a page');

  await assert.rejects(
    loadRawTable(dir),
    (err: unknown) => err instanceof ConfigurationError && err.message === `No raw page files found in ${dir}`
  );
});

test('a missing raw directory is a configuration error', async (t) => {
  const dir = await createTempDir(t);
  await assert.rejects(loadRawTable(path.join(dir, 'missing')), ConfigurationError);
});

test('only page files are listed, in name order', async (t) => {
  const dir = await createTempDir(t);
  for (const name of [
    'nyc311_2024-01-01_00002.parquet',
    'nyc311_clean.parquet',
    'nyc311_2023-12-01_00001.parquet',
    'nyc311_2024-01-01_00001.parquet'
  ]) {
    await writeFile(path.join(dir, name), '');
  }

  assert.deepEqual(await listRawPages(dir), [
    path.join(dir, 'nyc311_2023-12-01_00001.parquet'),
    path.join(dir, 'nyc311_2024-01-01_00001.parquet'),
    path.join(dir, 'nyc311_2024-01-01_00002.parquet')
  ]);
});
