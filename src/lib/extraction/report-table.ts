/**
 * Folds classified pairs into one record per report date and accumulates
 * records into the cumulative estimates table.
 */

import { compareQuarterKeys, formatQuarterKey } from './quarter-label';
import type { ClassifiedPair, QuarterEntry, ReportRecord } from './types';

/**
 * Quarter → value mapping for one chart, keys in chronological order.
 * If a quarter was matched twice, the leftmost pair wins.
 */
export function buildQuarterMap(classified: ClassifiedPair[]): Record<string, QuarterEntry> {
  const entries = new Map<string, QuarterEntry>();

  for (const { pair, classification } of classified) {
    const key = formatQuarterKey(pair.quarter, pair.year);
    if (entries.has(key)) continue;
    entries.set(key, {
      value: pair.value,
      isEstimate: classification.finalClass === 'light',
    });
  }

  return sortQuarterMap(Object.fromEntries(entries));
}

export function sortQuarterMap(quarters: Record<string, QuarterEntry>): Record<string, QuarterEntry> {
  const sorted: Record<string, QuarterEntry> = {};
  for (const key of Object.keys(quarters).sort(compareQuarterKeys)) {
    const entry = quarters[key];
    if (entry) sorted[key] = Object.freeze({ ...entry });
  }
  return sorted;
}

export function createReportRecord(
  reportDate: string,
  quarters: Record<string, QuarterEntry>,
  confidence: number
): ReportRecord {
  return Object.freeze({
    reportDate,
    quarters: Object.freeze(sortQuarterMap(quarters)),
    confidence,
  });
}

export type MergeOutcome = 'inserted' | 'replaced';

export class ReportTable {
  private readonly rows = new Map<string, ReportRecord>();
  private readonly columns = new Set<string>();

  static fromRecords(records: Iterable<ReportRecord>): ReportTable {
    const table = new ReportTable();
    for (const record of records) table.merge(record);
    return table;
  }

  /**
   * Insert or overwrite the row for `record.reportDate`. Quarter columns
   * only ever grow, even when an overwrite drops a quarter.
   */
  merge(record: ReportRecord): MergeOutcome {
    const outcome: MergeOutcome = this.rows.has(record.reportDate) ? 'replaced' : 'inserted';
    this.rows.set(record.reportDate, record);
    for (const key of Object.keys(record.quarters)) {
      this.columns.add(key);
    }
    return outcome;
  }

  /** Declare columns up front, e.g. from a loaded CSV header */
  addColumns(keys: Iterable<string>): void {
    for (const key of keys) this.columns.add(key);
  }

  get(reportDate: string): ReportRecord | undefined {
    return this.rows.get(reportDate);
  }

  get size(): number {
    return this.rows.size;
  }

  /** Rows in ascending report-date order */
  get records(): ReportRecord[] {
    return [...this.rows.values()].sort((a, b) => a.reportDate.localeCompare(b.reportDate));
  }

  get quarterColumns(): string[] {
    return [...this.columns].sort(compareQuarterKeys);
  }
}
