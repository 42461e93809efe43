/**
 * P/E ratios from the estimates table: a 4-quarter EPS sum per report,
 * divided by the most recent price on or before the report date.
 *
 * Windows relative to the first quarter starting on/after the report date (i):
 * - forward: quarters i+1 .. i+4
 * - mix: quarters i .. i+3
 * - trailing-like: quarters i-3 .. i
 */

import { parseQuarterKey } from '../extraction/quarter-label';
import type { ReportRecord } from '../extraction/types';

export type EpsWindow = 'forward' | 'mix' | 'trailing-like';

export interface PricePoint {
  /** ISO date, YYYY-MM-DD */
  date: string;
  price: number;
}

export interface PeRatioRow {
  reportDate: string;
  priceDate: string;
  price: number;
  epsSum: number;
  peRatio: number;
  type: EpsWindow;
}

/** First day of the quarter as an ISO date, e.g. Q2'15 → 2015-04-01 */
export function quarterStartDate(key: string): string | null {
  const parsed = parseQuarterKey(key);
  if (!parsed) return null;
  const month = (parsed.quarter - 1) * 3 + 1;
  return `${parsed.year}-${String(month).padStart(2, '0')}-01`;
}

interface DatedEps {
  start: string;
  eps: number;
}

function windowBounds(index: number, type: EpsWindow): [number, number] {
  switch (type) {
    case 'forward':
      return [index + 1, index + 5];
    case 'mix':
      return [index, index + 4];
    case 'trailing-like':
      return [Math.max(0, index - 3), index + 1];
  }
}

/**
 * Sum of four quarters of EPS around the report date. Estimate markers are
 * ignored and non-positive values are left out. A window that runs past the
 * last quarter sums what is there; null when nothing is left.
 */
export function fourQuarterEpsSum(record: ReportRecord, type: EpsWindow): number | null {
  const quarters: DatedEps[] = [];
  for (const [key, entry] of Object.entries(record.quarters)) {
    const start = quarterStartDate(key);
    if (start && entry.value > 0) quarters.push({ start, eps: entry.value });
  }
  if (quarters.length === 0) return null;

  quarters.sort((a, b) => a.start.localeCompare(b.start));

  const found = quarters.findIndex((q) => q.start >= record.reportDate);
  const index = found < 0 ? quarters.length : found;
  const [start, end] = windowBounds(index, type);
  if (start >= quarters.length) return null;

  return quarters.slice(start, end).reduce((sum, q) => sum + q.eps, 0);
}

function daysBetween(a: string, b: string): number {
  return Math.abs(Date.parse(`${a}T00:00:00Z`) - Date.parse(`${b}T00:00:00Z`)) / 86_400_000;
}

/**
 * Most recent price on or before `date`; when every price is later, the
 * closest one.
 */
export function priceForDate(prices: readonly PricePoint[], date: string): PricePoint | null {
  let onOrBefore: PricePoint | null = null;
  let closest: PricePoint | null = null;

  for (const point of prices) {
    if (point.date <= date && (!onOrBefore || point.date > onOrBefore.date)) {
      onOrBefore = point;
    }
    if (!closest || daysBetween(point.date, date) < daysBetween(closest.date, date)) {
      closest = point;
    }
  }

  return onOrBefore ?? closest;
}

export function calculatePeRatios(
  records: readonly ReportRecord[],
  prices: readonly PricePoint[],
  type: EpsWindow = 'forward'
): PeRatioRow[] {
  const rows: PeRatioRow[] = [];

  for (const record of records) {
    const price = priceForDate(prices, record.reportDate);
    if (!price) continue;

    const epsSum = fourQuarterEpsSum(record, type);
    if (epsSum === null || epsSum <= 0) continue;

    rows.push({
      reportDate: record.reportDate,
      priceDate: price.date,
      price: price.price,
      epsSum,
      peRatio: price.price / epsSum,
      type,
    });
  }

  return rows;
}
