/**
 * Per-report confidence: ensemble agreement averaged over the report's bars,
 * blended with how well its actual values agree with the closest earlier
 * report.
 */

import type { ClassifiedPair, ConfidenceLevel, QuarterEntry, ReportRecord } from './types';

/** Threshold: auto-accept */
const HIGH_THRESHOLD = 90;
/** Threshold: review recommended */
const MEDIUM_THRESHOLD = 70;

/** Relative change an actual value may show between reports */
export const CONSISTENCY_TOLERANCE = 0.2;
const BAR_WEIGHT = 0.5;
const CONSISTENCY_WEIGHT = 0.5;

export interface ReportScore {
  barScore: number;
  consistencyScore: number;
  confidence: number;
  level: ConfidenceLevel;
  /** Report date the consistency check compared against, if any */
  comparedWith: string | null;
}

export function getConfidenceLevel(score: number): ConfidenceLevel {
  if (score >= HIGH_THRESHOLD) return 'high';
  if (score >= MEDIUM_THRESHOLD) return 'medium';
  return 'low';
}

export function calculateBarScore(classified: ClassifiedPair[]): number {
  if (classified.length === 0) return 0;
  const total = classified.reduce((sum, c) => sum + c.classification.tierConfidence, 0);
  return total / classified.length;
}

/**
 * Closest record dated strictly before `reportDate`. Gaps between reports
 * are fine; the history does not need to be sorted.
 */
export function findPreviousRecord(reportDate: string, history: readonly ReportRecord[]): ReportRecord | null {
  let previous: ReportRecord | null = null;
  for (const record of history) {
    if (record.reportDate >= reportDate) continue;
    if (!previous || record.reportDate > previous.reportDate) {
      previous = record;
    }
  }
  return previous;
}

export function isConsistent(current: number, prior: number): boolean {
  return Math.abs(current - prior) / Math.max(Math.abs(prior), 0.01) <= CONSISTENCY_TOLERANCE;
}

/**
 * Share (0-100) of quarters that are actual in both reports and whose values
 * stayed within tolerance. Nothing to compare means nothing contradicts: 100.
 */
export function calculateConsistencyScore(
  quarters: Record<string, QuarterEntry>,
  previous: ReportRecord | null
): number {
  if (!previous) return 100;

  let comparable = 0;
  let matches = 0;

  for (const [key, entry] of Object.entries(quarters)) {
    if (entry.isEstimate) continue;
    const prior = previous.quarters[key];
    if (!prior || prior.isEstimate) continue;

    comparable++;
    if (isConsistent(entry.value, prior.value)) matches++;
  }

  if (comparable === 0) return 100;
  return (matches / comparable) * 100;
}

export function scoreReport(
  reportDate: string,
  quarters: Record<string, QuarterEntry>,
  classified: ClassifiedPair[],
  history: readonly ReportRecord[]
): ReportScore {
  const previous = findPreviousRecord(reportDate, history);
  const barScore = calculateBarScore(classified);
  const consistencyScore = calculateConsistencyScore(quarters, previous);

  // No matched bars: 0 regardless of consistency
  const raw = classified.length === 0
    ? 0
    : BAR_WEIGHT * barScore + CONSISTENCY_WEIGHT * consistencyScore;
  const confidence = Math.round(raw * 10) / 10;

  return {
    barScore,
    consistencyScore,
    confidence,
    level: getConfidenceLevel(confidence),
    comparedWith: previous?.reportDate ?? null,
  };
}
