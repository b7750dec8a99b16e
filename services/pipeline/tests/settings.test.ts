import assert from 'node:assert/strict';
import { test } from 'node:test';
import { EnvConfigError } from '@nyc311/shared';
import {
  createdDateFilter,
  loadPipelineEnv,
  resolveDateRange,
  resolveIngestSettings,
  resolveProcessSettings,
  resolveSummariesSettings
} from '../src/config/settings';
import { ConfigurationError } from '../src/errors';

const now = new Date('2024-06-15T12:00:00Z');

test('command-line dates win over environment dates', () => {
  const env = loadPipelineEnv({ SINCE_DATE: '2024-01-01', UNTIL_DATE: '2024-03-31' });
  assert.deepEqual(resolveDateRange({ since: '2024-02-01', yearsBack: 5 }, env, now), {
    since: '2024-02-01',
    until: '2024-03-31'
  });
  assert.deepEqual(resolveDateRange({ yearsBack: 5 }, env, now), { since: '2024-01-01', until: '2024-03-31' });
});

test('without dates the window rolls back from today in New York', () => {
  const env = loadPipelineEnv({});
  assert.deepEqual(resolveDateRange({ yearsBack: 1 }, env, now), { since: '2023-06-16', until: '2024-06-15' });
  assert.deepEqual(resolveDateRange({ yearsBack: 1 }, env, new Date('2024-01-01T03:00:00Z')), {
    since: '2022-12-31',
    until: '2023-12-31'
  });
});

test('an inverted range is a configuration error', () => {
  assert.throws(
    () => resolveDateRange({ since: '2024-02-01', until: '2024-01-01', yearsBack: 5 }, loadPipelineEnv({}), now),
    (err: unknown) => err instanceof ConfigurationError && err.message === 'since (2024-02-01) is after until (2024-01-01)'
  );
});

test('malformed command-line dates are rejected', () => {
  assert.throws(
    () => resolveDateRange({ since: '2024/01/01', yearsBack: 5 }, loadPipelineEnv({}), now),
    ConfigurationError
  );
});

test('malformed environment values are rejected', () => {
  assert.throws(() => loadPipelineEnv({ SINCE_DATE: 'last week' }), EnvConfigError);
  assert.throws(() => loadPipelineEnv({ PAGE_SIZE: '0' }), EnvConfigError);
  assert.throws(() => loadPipelineEnv({ NYC311_HOLIDAYS: 'maybe' }), EnvConfigError);
});

test('the filter covers whole days', () => {
  assert.equal(
    createdDateFilter({ since: '2024-01-01', until: '2024-01-31' }),
    "created_date between '2024-01-01T00:00:00' and '2024-01-31T23:59:59'"
  );
});

test('ingest settings combine flags, environment and defaults', () => {
  const settings = resolveIngestSettings(
    { pageSize: 1_000, since: '2024-01-01', until: '2024-01-31' },
    { env: { PAGE_SIZE: '20', OUT_DIR: 'tmp/raw', SOCRATA_TOKEN: 'test-token' }, now }
  );
  assert.deepEqual(settings, {
    domain: 'data.cityofnewyork.us',
    datasetId: 'erm2-nwe9',
    appToken: 'test-token',
    tokenEnv: 'SOCRATA_APP_TOKEN',
    range: { since: '2024-01-01', until: '2024-01-31' },
    pageSize: 1_000,
    maxRows: null,
    outDir: 'tmp/raw',
    maxRetries: 5,
    timeoutMs: 120_000,
    dryRun: false
  });
});

test('the token is read from the named variable first', () => {
  const settings = resolveIngestSettings(
    { soTokenEnv: 'CUSTOM_TOKEN', limit: 10, timeout: 30, maxRetries: 2, dryRun: true },
    { env: { CUSTOM_TOKEN: 'custom-test-token', SOCRATA_TOKEN: 'test-token' }, now }
  );
  assert.equal(settings.appToken, 'custom-test-token');
  assert.equal(settings.tokenEnv, 'CUSTOM_TOKEN');
  assert.equal(settings.maxRows, 10);
  assert.equal(settings.timeoutMs, 30_000);
  assert.equal(settings.maxRetries, 2);
  assert.equal(settings.dryRun, true);
  assert.equal(settings.pageSize, 50_000);
});

test('raw pages default to the raw directory under the data root', () => {
  assert.equal(resolveIngestSettings({}, { env: { NYC311_DATA_ROOT: '/srv/nyc311' }, now }).outDir, '/srv/nyc311/raw');
  assert.equal(resolveIngestSettings({}, { env: {}, now }).outDir, 'data/raw');
  assert.equal(
    resolveIngestSettings({ outDir: 'elsewhere' }, { env: { NYC311_DATA_ROOT: '/srv/nyc311', OUT_DIR: 'raw-pages' }, now })
      .outDir,
    'elsewhere'
  );
});

test('a missing token resolves to null', () => {
  assert.equal(resolveIngestSettings({}, { env: {}, now }).appToken, null);
});

test('non-positive numeric flags are rejected', () => {
  assert.throws(() => resolveIngestSettings({ limit: 0 }, { env: {}, now }), ConfigurationError);
  assert.throws(() => resolveIngestSettings({ pageSize: -5 }, { env: {}, now }), ConfigurationError);
});

test('process and summaries settings resolve paths under the data root', () => {
  const env = loadPipelineEnv({ NYC311_DATA_ROOT: '/srv/nyc311', SLA_HOURS: '48', NYC311_PARTITIONED_WRITE: 'false' });
  assert.deepEqual(resolveProcessSettings(env), {
    paths: {
      rawDir: '/srv/nyc311/raw',
      cleanFile: '/srv/nyc311/processed/nyc311_clean.parquet',
      partitionRoot: '/srv/nyc311/processed_part',
      summariesDir: '/srv/nyc311/summaries'
    },
    slaHours: 48,
    partitionedWrite: false,
    holidays: true
  });

  const summaries = resolveSummariesSettings({ sla: 12 }, env);
  assert.equal(summaries.slaHours, 12);
  assert.equal(summaries.outDir, '/srv/nyc311/summaries');
  assert.equal(resolveSummariesSettings({ outDir: 'out' }, env).slaHours, 48);
  assert.throws(() => resolveSummariesSettings({ sla: -1 }, env), ConfigurationError);
});
