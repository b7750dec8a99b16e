import { Command, InvalidArgumentError } from 'commander';
import { createLogger, type EnvSource, type Logger } from '@nyc311/shared';
import { SodaClient } from '@nyc311/soda-client';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_TOKEN_ENV,
  TOKEN_ENV_ALIAS,
  loadPipelineEnv,
  resolveIngestSettings,
  resolveProcessSettings,
  resolveSummariesSettings,
  type IngestCliOptions,
  type IngestSettings,
  type SummariesCliOptions
} from './config/settings';
import type { SodaQueryClient } from './ingestion/fetcher';
import { runIngestion } from './ingestion/ingest';
import { createPartitionWriter, type PartitionWriter } from './processing/publish';
import { runProcessing } from './processing/process';
import { runSummaries } from './summaries/summaries';
import { createHolidayCalendar, type HolidayCalendar } from './time/holidays';

const USER_AGENT = 'nyc311-pipeline/0.1.0';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return parsed;
}

function createClient(settings: IngestSettings): SodaQueryClient {
  return new SodaClient({
    domain: settings.domain,
    appToken: settings.appToken,
    timeoutMs: settings.timeoutMs,
    userAgent: USER_AGENT
  });
}

export type CliDependencies = {
  env?: EnvSource;
  logger?: Logger;
  now?: () => Date;
  clientFactory?: (settings: IngestSettings) => SodaQueryClient;
  holidays?: HolidayCalendar;
  partitionWriter?: PartitionWriter;
};

export function createInterface(deps: CliDependencies = {}): Command {
  const env = deps.env ?? process.env;
  const clientFactory = deps.clientFactory ?? createClient;
  const resolveLogger = (level: string): Logger => deps.logger ?? createLogger(level);

  const program = new Command();
  program.name('nyc311').description('Ingest, clean and summarize NYC 311 service requests');

  program
    .command('ingest')
    .description('Fetch service requests from the open data API into raw Parquet pages')
    .option('--years <n>', 'Years back from today when no explicit dates are given', parseInteger)
    .option('--page-size <n>', 'Rows per request', parseInteger)
    .option('--limit <n>', 'Stop after this many rows', parseInteger)
    .option('--out-dir <dir>', 'Directory for raw page files')
    .option('--max-retries <n>', 'Attempts per request before giving up', parseInteger, DEFAULT_MAX_RETRIES)
    .option('--timeout <seconds>', 'Per-request timeout in seconds', parseInteger, DEFAULT_TIMEOUT_SECONDS)
    .option('--dry-run', 'Fetch and paginate without writing files', false)
    .option('--so-token-env <name>', 'Environment variable holding the app token', DEFAULT_TOKEN_ENV)
    .option('--since <date>', 'First creation date to include (YYYY-MM-DD)')
    .option('--until <date>', 'Last creation date to include (YYYY-MM-DD)')
    .action(async (cmdOptions: IngestCliOptions) => {
      const logger = resolveLogger(loadPipelineEnv(env).LOG_LEVEL);
      const settings = resolveIngestSettings(cmdOptions, { env, now: deps.now?.() });
      if (!settings.appToken) {
        logger.warn(
          { tokenEnv: settings.tokenEnv },
          `No app token in ${settings.tokenEnv} or ${TOKEN_ENV_ALIAS}; requests may be throttled`
        );
      }
      await runIngestion(settings, { client: clientFactory(settings), logger });
    });

  program
    .command('process')
    .description('Build the clean dataset from raw pages and publish it')
    .action(async () => {
      const pipelineEnv = loadPipelineEnv(env);
      const logger = resolveLogger(pipelineEnv.LOG_LEVEL);
      const settings = resolveProcessSettings(pipelineEnv);
      await runProcessing(settings, {
        logger,
        holidays: deps.holidays ?? createHolidayCalendar(settings.holidays, logger),
        partitionWriter: deps.partitionWriter ?? createPartitionWriter(settings.partitionedWrite)
      });
    });

  program
    .command('summaries')
    .description('Precompute summary tables from the clean dataset')
    .option('--sla <hours>', 'SLA threshold in hours', parseNumber)
    .option('--out-dir <dir>', 'Directory for summary files')
    .action(async (cmdOptions: SummariesCliOptions) => {
      const pipelineEnv = loadPipelineEnv(env);
      const logger = resolveLogger(pipelineEnv.LOG_LEVEL);
      await runSummaries(resolveSummariesSettings(cmdOptions, pipelineEnv), { logger });
    });

  return program;
}
