import path from 'node:path';
import type { BackoffOptions, Logger } from '@nyc311/shared';
import { createdDateFilter, type IngestSettings } from '../config/settings';
import { SELECT_COLUMNS } from '../records';
import { countRowsWithRetry, fetchWithRetry, type FetchRetryOptions, type SodaQueryClient } from './fetcher';
import { normalizeSodaPage, pageFileName, ParquetPageSink, type PageArtifact, type PageSink } from './pages';

export type IngestionDependencies = {
  client: SodaQueryClient;
  logger: Logger;
  sink?: PageSink;
  sleep?: (ms: number) => Promise<void>;
  backoff?: BackoffOptions;
};

export interface IngestionReport {
  since: string;
  until: string;
  where: string;
  estimatedRows: number;
  estimatedPages: number;
  totalRows: number;
  pages: PageArtifact[];
  dryRun: boolean;
}

export type IngestionSettings = Pick<
  IngestSettings,
  'datasetId' | 'range' | 'pageSize' | 'maxRows' | 'outDir' | 'maxRetries' | 'dryRun'
>;

/**
 * Pages through every row created in the settings' date range and hands each
 * page to the sink. Stops on an empty page, a short page, or once `maxRows`
 * rows have been collected.
 */
export async function runIngestion(settings: IngestionSettings, deps: IngestionDependencies): Promise<IngestionReport> {
  const { client, logger } = deps;
  const sink = deps.sink ?? new ParquetPageSink(settings.outDir);
  const retry: FetchRetryOptions = {
    maxRetries: settings.maxRetries,
    logger,
    sleep: deps.sleep,
    backoff: deps.backoff
  };
  const where = createdDateFilter(settings.range);
  logger.info({ where }, 'Resolved ingestion filter');

  let estimatedRows: number;
  if (settings.maxRows !== null) {
    estimatedRows = settings.maxRows;
  } else {
    logger.info('Counting total rows for query to page through results');
    estimatedRows = await countRowsWithRetry(client, settings.datasetId, where, retry);
  }
  const estimatedPages = estimatedRows > 0 ? Math.ceil(estimatedRows / settings.pageSize) : 0;
  logger.info(
    {
      estimatedRows,
      estimatedPages,
      pageSize: settings.pageSize,
      since: settings.range.since,
      until: settings.range.until
    },
    `Fetching ~${estimatedRows.toLocaleString('en-US')} rows in ${estimatedPages} pages`
  );

  const pages: PageArtifact[] = [];
  let offset = 0;
  let written = 0;

  for (;;) {
    let limit = settings.pageSize;
    if (settings.maxRows !== null) {
      const remaining = settings.maxRows - written;
      if (remaining <= 0) {
        break;
      }
      limit = Math.min(settings.pageSize, remaining);
    }

    const rows = await fetchWithRetry(
      client,
      settings.datasetId,
      {
        select: SELECT_COLUMNS.join(','),
        where,
        order: 'created_date ASC',
        limit,
        offset
      },
      retry
    );
    if (rows.length === 0) {
      break;
    }

    const records = normalizeSodaPage(rows, offset);
    const pageIndex = pages.length + 1;
    const fileName = pageFileName(settings.range.since, pageIndex);
    written += records.length;

    if (settings.dryRun) {
      logger.info({ rows: records.length, fileName, offset }, `Dry-run: would write ${records.length} rows`);
      pages.push({
        pageIndex,
        fileName,
        filePath: path.join(settings.outDir, fileName),
        rows: records.length,
        written: false
      });
    } else {
      const filePath = await sink.writePage(fileName, records);
      logger.info({ rows: records.length, filePath, offset }, `Wrote ${records.length} rows`);
      pages.push({ pageIndex, fileName, filePath, rows: records.length, written: true });
    }

    if (records.length < limit) {
      break;
    }
    if (settings.maxRows !== null && written >= settings.maxRows) {
      break;
    }
    offset += limit;
  }

  logger.info({ totalRows: written, pages: pages.length }, `Done. Total rows written: ${written}`);
  return {
    since: settings.range.since,
    until: settings.range.until,
    where,
    estimatedRows,
    estimatedPages,
    totalRows: written,
    pages,
    dryRun: settings.dryRun
  };
}
