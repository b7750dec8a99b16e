import path from 'node:path';
import { z } from 'zod';
import {
  booleanVar,
  integerVar,
  isIsoDate,
  isoDateVar,
  loadEnvConfig,
  numberVar,
  stringVar,
  type EnvSource
} from '@nyc311/shared';
import { ConfigurationError } from '../errors';
import { CIVIC_TIME_ZONE, civicDate } from '../time/timestamps';

export const DEFAULT_TOKEN_ENV = 'SOCRATA_APP_TOKEN';
export const TOKEN_ENV_ALIAS = 'SOCRATA_TOKEN';
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_TIMEOUT_SECONDS = 120;

const pipelineEnvSchema = z.object({
  SOCRATA_DOMAIN: stringVar({ defaultValue: 'data.cityofnewyork.us' }),
  SOCRATA_DATASET_ID: stringVar({ defaultValue: 'erm2-nwe9' }),
  YEARS_BACK: integerVar({ defaultValue: 5, min: 1 }),
  PAGE_SIZE: integerVar({ defaultValue: 50_000, min: 1 }),
  OUT_DIR: stringVar(),
  SINCE_DATE: isoDateVar(),
  UNTIL_DATE: isoDateVar(),
  SLA_HOURS: numberVar({ defaultValue: 24, min: 0 }),
  NYC311_DATA_ROOT: stringVar({ defaultValue: 'data' }),
  NYC311_PARTITIONED_WRITE: booleanVar({ defaultValue: true }),
  NYC311_HOLIDAYS: booleanVar({ defaultValue: true }),
  LOG_LEVEL: stringVar({ defaultValue: 'info', pattern: /^(fatal|error|warn|info|debug|trace|silent)$/ })
});

export type PipelineEnv = z.infer<typeof pipelineEnvSchema>;

export function loadPipelineEnv(env?: EnvSource): PipelineEnv {
  return loadEnvConfig(pipelineEnvSchema, { env, context: 'nyc311' });
}

export interface DataPaths {
  rawDir: string;
  cleanFile: string;
  partitionRoot: string;
  summariesDir: string;
}

export function resolveDataPaths(root: string): DataPaths {
  return {
    rawDir: path.join(root, 'raw'),
    cleanFile: path.join(root, 'processed', 'nyc311_clean.parquet'),
    partitionRoot: path.join(root, 'processed_part'),
    summariesDir: path.join(root, 'summaries')
  };
}

export interface DateRange {
  since: string;
  until: string;
}

export type DateRangeInput = {
  since?: string;
  until?: string;
  yearsBack: number;
};

function checkCliDate(value: string | undefined, flag: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!isIsoDate(trimmed)) {
    throw new ConfigurationError(`Invalid ${flag} date (expected YYYY-MM-DD): ${value}`);
  }
  return trimmed;
}

/**
 * CLI dates win over SINCE_DATE/UNTIL_DATE, which win over a rolling window
 * of `yearsBack` × 365 days ending today in the civic time zone.
 */
export function resolveDateRange(input: DateRangeInput, env: PipelineEnv, now: Date = new Date()): DateRange {
  const today = civicDate(now, CIVIC_TIME_ZONE);
  const since =
    checkCliDate(input.since, '--since') ??
    env.SINCE_DATE ??
    today.minus({ days: 365 * input.yearsBack }).toFormat('yyyy-MM-dd');
  const until = checkCliDate(input.until, '--until') ?? env.UNTIL_DATE ?? today.toFormat('yyyy-MM-dd');

  if (since > until) {
    throw new ConfigurationError(`since (${since}) is after until (${until})`);
  }
  return { since, until };
}

export function createdDateFilter(range: DateRange): string {
  return `created_date between '${range.since}T00:00:00' and '${range.until}T23:59:59'`;
}

export type IngestCliOptions = {
  years?: number;
  pageSize?: number;
  limit?: number;
  outDir?: string;
  maxRetries?: number;
  timeout?: number;
  dryRun?: boolean;
  soTokenEnv?: string;
  since?: string;
  until?: string;
};

export interface IngestSettings {
  domain: string;
  datasetId: string;
  appToken: string | null;
  tokenEnv: string;
  range: DateRange;
  pageSize: number;
  maxRows: number | null;
  outDir: string;
  maxRetries: number;
  timeoutMs: number;
  dryRun: boolean;
}

function positiveInteger(value: number | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${flag} must be a positive integer (received ${value})`);
  }
  return value;
}

export function resolveIngestSettings(
  cli: IngestCliOptions,
  options: { env?: EnvSource; now?: Date } = {}
): IngestSettings {
  const rawEnv = options.env ?? process.env;
  const env = loadPipelineEnv(rawEnv);
  const tokenEnv = cli.soTokenEnv?.trim() || DEFAULT_TOKEN_ENV;
  const appToken = rawEnv[tokenEnv]?.trim() || rawEnv[TOKEN_ENV_ALIAS]?.trim() || null;
  const yearsBack = positiveInteger(cli.years, '--years') ?? env.YEARS_BACK;

  return {
    domain: env.SOCRATA_DOMAIN,
    datasetId: env.SOCRATA_DATASET_ID,
    appToken,
    tokenEnv,
    range: resolveDateRange({ since: cli.since, until: cli.until, yearsBack }, env, options.now),
    pageSize: positiveInteger(cli.pageSize, '--page-size') ?? env.PAGE_SIZE,
    maxRows: positiveInteger(cli.limit, '--limit') ?? null,
    outDir: cli.outDir?.trim() || env.OUT_DIR || resolveDataPaths(env.NYC311_DATA_ROOT).rawDir,
    maxRetries: positiveInteger(cli.maxRetries, '--max-retries') ?? DEFAULT_MAX_RETRIES,
    timeoutMs: (positiveInteger(cli.timeout, '--timeout') ?? DEFAULT_TIMEOUT_SECONDS) * 1_000,
    dryRun: Boolean(cli.dryRun)
  };
}

export interface ProcessSettings {
  paths: DataPaths;
  slaHours: number;
  partitionedWrite: boolean;
  holidays: boolean;
}

export function resolveProcessSettings(env: PipelineEnv): ProcessSettings {
  return {
    paths: resolveDataPaths(env.NYC311_DATA_ROOT),
    slaHours: env.SLA_HOURS,
    partitionedWrite: env.NYC311_PARTITIONED_WRITE,
    holidays: env.NYC311_HOLIDAYS
  };
}

export type SummariesCliOptions = {
  sla?: number;
  outDir?: string;
};

export interface SummariesSettings {
  paths: DataPaths;
  slaHours: number;
  outDir: string;
}

export function resolveSummariesSettings(cli: SummariesCliOptions, env: PipelineEnv): SummariesSettings {
  const paths = resolveDataPaths(env.NYC311_DATA_ROOT);
  if (cli.sla !== undefined && (!Number.isFinite(cli.sla) || cli.sla < 0)) {
    throw new ConfigurationError(`--sla must be a non-negative number (received ${cli.sla})`);
  }
  return {
    paths,
    slaHours: cli.sla ?? env.SLA_HOURS,
    outDir: cli.outDir?.trim() || paths.summariesDir
  };
}
