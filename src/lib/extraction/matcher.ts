/**
 * Spatial matching of quarter labels (bottom band) to the EPS values printed
 * above their bars.
 *
 * Column alignment is the reliable signal, so horizontal offset is weighted
 * 10x while vertical offset only acts as a loose bound (0.1x).
 */

import { centerX, centerY } from './geometry';
import { toNumericCandidate } from './numeric';
import { normalizeQuarterLabel } from './quarter-label';
import type { NumericCandidate, QuarterLabel, QuarterValuePair, TextDetection } from './types';

export interface MatchOptions {
  /** Fraction of the image height, measured from the bottom, that holds labels */
  bottomFraction: number;
  xTolerance: number;
  yTolerance: number;
  xWeight: number;
  yWeight: number;
}

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  bottomFraction: 0.3,
  xTolerance: 10,
  yTolerance: 1000,
  xWeight: 10,
  yWeight: 0.1,
};

export interface DetectionPartition {
  labels: QuarterLabel[];
  numbers: NumericCandidate[];
}

/**
 * Split one image's detections into quarter labels and numeric candidates.
 * A detection that became a label is never also a number.
 */
export function partitionDetections(
  detections: TextDetection[],
  imageHeight: number,
  bottomFraction = DEFAULT_MATCH_OPTIONS.bottomFraction
): DetectionPartition {
  const bandTop = imageHeight * (1 - bottomFraction);
  const labels: QuarterLabel[] = [];
  const numbers: NumericCandidate[] = [];

  for (const detection of detections) {
    const label = detection.box.y0 >= bandTop ? normalizeQuarterLabel(detection) : null;
    if (label) {
      labels.push(label);
      continue;
    }

    const number = toNumericCandidate(detection);
    if (number) numbers.push(number);
  }

  return { labels, numbers };
}

interface ScoredCandidate {
  index: number;
  candidate: NumericCandidate;
  xDiff: number;
  yDiff: number;
  distance: number;
}

function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.xDiff !== b.xDiff) return a.xDiff - b.xDiff;
  return a.candidate.box.x0 - b.candidate.box.x0;
}

/**
 * Pair each label with its nearest qualifying numeric candidate, left to
 * right. A claimed candidate is not offered to later labels, and labels with
 * no candidate in range are dropped.
 */
export function matchQuartersWithValues(
  labels: QuarterLabel[],
  numbers: NumericCandidate[],
  options: Partial<MatchOptions> = {}
): QuarterValuePair[] {
  const opts = { ...DEFAULT_MATCH_OPTIONS, ...options };
  const claimed = new Set<number>();
  const pairs: QuarterValuePair[] = [];

  const ordered = [...labels].sort((a, b) => a.box.x0 - b.box.x0);

  for (const label of ordered) {
    const labelX = centerX(label.box);
    const labelY = centerY(label.box);

    let best: ScoredCandidate | null = null;

    for (let index = 0; index < numbers.length; index++) {
      const candidate = numbers[index];
      if (!candidate || claimed.has(index)) continue;

      const valueY = centerY(candidate.box);
      if (valueY >= labelY) continue;

      const xDiff = Math.abs(centerX(candidate.box) - labelX);
      const yDiff = labelY - valueY;
      if (xDiff > opts.xTolerance || yDiff > opts.yTolerance) continue;

      const distance = Math.sqrt((opts.xWeight * xDiff) ** 2 + (opts.yWeight * yDiff) ** 2);
      const scored: ScoredCandidate = { index, candidate, xDiff, yDiff, distance };
      if (best === null || compareScored(scored, best) < 0) {
        best = scored;
      }
    }

    if (best === null) {
      console.log(`[Matcher] No value found for "${label.sourceText}"`);
      continue;
    }

    claimed.add(best.index);
    pairs.push({
      quarter: label.quarter,
      year: label.year,
      value: best.candidate.value,
      labelBox: label.box,
      valueBox: best.candidate.box,
      xDiff: best.xDiff,
      yDiff: best.yDiff,
      distance: best.distance,
    });
  }

  return pairs;
}
