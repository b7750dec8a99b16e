import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { TestContext } from 'node:test';
import { createLogger, type Logger } from '@nyc311/shared';
import { SodaClientError, SodaTransportError, type SodaRow, type SoqlQuery } from '@nyc311/soda-client';
import type { SodaQueryClient } from '../src/ingestion/fetcher';
import type { RawServiceRequest } from '../src/records';

export type LogEntry = Record<string, unknown> & { level: number; msg: string };

const LEVELS = { warn: 40, error: 50 } as const;

/** A pino logger that keeps every line in memory. */
export function createTestLogger(): {
  logger: Logger;
  entries: LogEntry[];
  at(level: keyof typeof LEVELS): LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = createLogger('debug', {
    write(line: string) {
      const parsed: unknown = JSON.parse(line);
      if (parsed && typeof parsed === 'object' && 'level' in parsed && 'msg' in parsed) {
        const { level, msg } = parsed;
        if (typeof level === 'number' && typeof msg === 'string') {
          entries.push({ ...parsed, level, msg });
        }
      }
    }
  });
  return { logger, entries, at: (level) => entries.filter((entry) => entry.level === LEVELS[level]) };
}

export async function createTempDir(t: TestContext, prefix = 'nyc311-'): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  return dir;
}

/**
 * In-memory stand-in for the SODA resource endpoint: serves `$limit/$offset`
 * slices of a fixed row list.
 */
export type FakeSodaFailures = {
  /** Every query at or past this offset fails with a transport error. */
  fromOffset?: number;
  /** Number of count queries that fail before one succeeds. */
  countFailures?: number;
};

export class FakeSodaClient implements SodaQueryClient {
  readonly queries: SoqlQuery[] = [];
  countCalls = 0;

  constructor(
    private readonly rows: SodaRow[],
    private readonly failures: FakeSodaFailures = {}
  ) {}

  async query(_datasetId: string, query: SoqlQuery): Promise<SodaRow[]> {
    this.queries.push(query);
    const offset = query.offset ?? 0;
    if (this.failures.fromOffset !== undefined && offset >= this.failures.fromOffset) {
      throw new SodaTransportError(`Request to example.test failed: ECONNRESET at offset ${offset}`);
    }
    const limit = query.limit ?? this.rows.length;
    return this.rows.slice(offset, offset + limit);
  }

  async count(): Promise<number> {
    this.countCalls += 1;
    if (this.countCalls <= (this.failures.countFailures ?? 0)) {
      throw new SodaClientError('Service unavailable', { statusCode: 503 });
    }
    return this.rows.length;
  }
}

export function sodaRows(count: number): SodaRow[] {
  return Array.from({ length: count }, (_, index) => ({
    unique_key: String(1000 + index),
    created_date: `2024-01-${String(index + 1).padStart(2, '0')}T15:00:00.000`,
    closed_date: `2024-01-${String(index + 1).padStart(2, '0')}T17:30:00.000`,
    agency: 'NYPD',
    complaint_type: index % 2 === 0 ? 'Noise - Residential' : 'Illegal Parking',
    descriptor: 'Loud Music/Party',
    status: 'Closed',
    borough: index % 2 === 0 ? 'BROOKLYN' : 'QUEENS',
    incident_zip: '11201',
    city: index % 2 === 0 ? 'BROOKLYN' : 'ASTORIA',
    open_data_channel_type: 'PHONE',
    latitude: '40.6943',
    longitude: '-73.9918'
  }));
}

export function rawRequest(overrides: Partial<RawServiceRequest>): RawServiceRequest {
  return {
    unique_key: '1',
    created_date: '2024-03-05T10:00:00',
    closed_date: null,
    resolution_action_updated_date: null,
    agency: 'DSNY',
    complaint_type: 'Dirty Condition',
    descriptor: 'Trash',
    status: 'Closed',
    borough: 'MANHATTAN',
    incident_zip: '10001',
    city: 'NEW YORK',
    open_data_channel_type: 'ONLINE',
    latitude: 40.75,
    longitude: -73.99,
    ...overrides
  };
}
