import { classifySla } from '../processing/features';

/** The clean columns the summary tables are built from. */
export interface SummaryInputRow {
  date: string;
  dow_name: string;
  hour: number;
  borough: string | null;
  complaint_type: string | null;
  response_hours: number | null;
}

type SlaStats = {
  tickets: number;
  sla_eligible: number;
  median_response: number | null;
};

export type DailySummaryRow = {
  date: string;
  borough: string | null;
  complaint_type: string | null;
} & SlaStats & { pct_within: number | null };

export type ComplaintTypeSummaryRow = {
  complaint_type: string | null;
  borough: string | null;
} & SlaStats & { breach_rate: number | null };

export type DowHourSummaryRow = {
  dow_name: string;
  hour: number;
  borough: string | null;
  complaint_type: string | null;
} & SlaStats & { breach_rate: number | null };

export interface SummaryTables {
  daily: DailySummaryRow[];
  complaintType: ComplaintTypeSummaryRow[];
  dowHour: DowHourSummaryRow[];
}

/** Median of the values, interpolating between the two middle values. */
export function median(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

class GroupAccumulator {
  tickets = 0;
  within = 0;
  breach = 0;
  readonly hours: number[] = [];

  add(row: SummaryInputRow, slaHours: number): void {
    this.tickets += 1;
    const sla = classifySla(row.response_hours, slaHours);
    if (sla === null || row.response_hours === null) {
      return;
    }
    this.hours.push(row.response_hours);
    if (sla === 'within') {
      this.within += 1;
    } else {
      this.breach += 1;
    }
  }

  stats(): SlaStats {
    return { tickets: this.tickets, sla_eligible: this.hours.length, median_response: median(this.hours) };
  }

  rate(count: number): number | null {
    return this.hours.length > 0 ? count / this.hours.length : null;
  }
}

function groupBy<K>(
  rows: readonly SummaryInputRow[],
  slaHours: number,
  keyOf: (row: SummaryInputRow) => K
): Array<{ key: K; acc: GroupAccumulator }> {
  const groups = new Map<string, { key: K; acc: GroupAccumulator }>();
  for (const row of rows) {
    const key = keyOf(row);
    const id = JSON.stringify(key);
    let group = groups.get(id);
    if (!group) {
      group = { key, acc: new GroupAccumulator() };
      groups.set(id, group);
    }
    group.acc.add(row, slaHours);
  }
  return [...groups.values()];
}

/** Ascending, nulls last. */
function compareNullable(a: string | null, b: string | null): number {
  if (a === b) {
    return 0;
  }
  if (a === null) {
    return 1;
  }
  if (b === null) {
    return -1;
  }
  return a < b ? -1 : 1;
}

export function buildSummaries(rows: readonly SummaryInputRow[], slaHours: number): SummaryTables {
  const daily = groupBy(rows, slaHours, (row) => ({
    date: row.date,
    borough: row.borough,
    complaint_type: row.complaint_type
  }))
    .map(({ key, acc }): DailySummaryRow => ({ ...key, ...acc.stats(), pct_within: acc.rate(acc.within) }))
    .sort(
      (a, b) =>
        compareNullable(b.date, a.date) ||
        compareNullable(a.borough, b.borough) ||
        compareNullable(a.complaint_type, b.complaint_type)
    );

  const complaintType = groupBy(rows, slaHours, (row) => ({
    complaint_type: row.complaint_type,
    borough: row.borough
  }))
    .map(({ key, acc }): ComplaintTypeSummaryRow => ({ ...key, ...acc.stats(), breach_rate: acc.rate(acc.breach) }))
    .sort(
      (a, b) => compareNullable(a.complaint_type, b.complaint_type) || compareNullable(a.borough, b.borough)
    );

  const dowHour = groupBy(rows, slaHours, (row) => ({
    dow_name: row.dow_name,
    hour: row.hour,
    borough: row.borough,
    complaint_type: row.complaint_type
  }))
    .map(({ key, acc }): DowHourSummaryRow => ({ ...key, ...acc.stats(), breach_rate: acc.rate(acc.breach) }))
    .sort(
      (a, b) =>
        compareNullable(a.dow_name, b.dow_name) ||
        a.hour - b.hour ||
        compareNullable(a.borough, b.borough) ||
        compareNullable(a.complaint_type, b.complaint_type)
    );

  return { daily, complaintType, dowHour };
}
