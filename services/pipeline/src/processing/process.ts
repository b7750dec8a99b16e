import type { Logger } from '@nyc311/shared';
import type { ProcessSettings } from '../config/settings';
import type { HolidayCalendar } from '../time/holidays';
import { engineerFeatures } from './features';
import { publishCleanTable, type PartitionWriter, type PublishReport } from './publish';
import { loadRawTable } from './rawLoader';

export type ProcessingDependencies = {
  logger: Logger;
  holidays: HolidayCalendar;
  partitionWriter: PartitionWriter;
};

export interface ProcessingReport extends PublishReport {
  rawRows: number;
  droppedRows: number;
}

export async function runProcessing(
  settings: Pick<ProcessSettings, 'paths' | 'slaHours'>,
  deps: ProcessingDependencies
): Promise<ProcessingReport> {
  const { logger } = deps;
  const raw = await loadRawTable(settings.paths.rawDir);
  logger.info({ rows: raw.length, rawDir: settings.paths.rawDir }, `Loaded ${raw.length} raw rows`);

  const table = engineerFeatures(raw, { slaHours: settings.slaHours, holidays: deps.holidays });
  const droppedRows = raw.length - table.rows.length;
  if (droppedRows > 0) {
    logger.warn({ droppedRows }, `Dropped ${droppedRows} rows without a creation timestamp`);
  }

  const report = await publishCleanTable(table, settings.paths, deps);
  return { ...report, rawRows: raw.length, droppedRows };
}
