/**
 * Shared types for the chart extraction pipeline.
 *
 * Coordinates are image pixels with the origin at the top-left corner;
 * y grows downward.
 */

export interface BoxRect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface TextDetection {
  text: string;
  box: BoxRect;
  /** OCR recognition confidence in [0, 1] */
  confidence: number;
}

export type QuarterNumber = 1 | 2 | 3 | 4;

export interface QuarterLabel {
  quarter: QuarterNumber;
  /** Four-digit year (2-digit labels are stored as 2000 + yy) */
  year: number;
  box: BoxRect;
  sourceText: string;
}

export interface NumericCandidate {
  value: number;
  box: BoxRect;
  sourceText: string;
}

export interface QuarterValuePair {
  quarter: QuarterNumber;
  year: number;
  value: number;
  labelBox: BoxRect;
  valueBox: BoxRect;
  xDiff: number;
  yDiff: number;
  distance: number;
}

export type BarClass = 'dark' | 'light';

export type ClassificationMethod = 'AdaptiveThreshold' | 'MorphologicalClosing' | 'InvertedOtsu';

export interface BarVote {
  method: ClassificationMethod;
  whiteRatio: number;
  vote: BarClass;
}

export type TierConfidence = 100 | 67 | 33;

export interface ClassificationResult {
  votes: BarVote[];
  agreementCount: number;
  finalClass: BarClass;
  tierConfidence: TierConfidence;
}

export interface ClassifiedPair {
  pair: QuarterValuePair;
  classification: ClassificationResult;
}

export interface QuarterEntry {
  value: number;
  isEstimate: boolean;
}

export interface ReportRecord {
  /** ISO calendar date, YYYY-MM-DD */
  reportDate: string;
  /** Keyed by `Q{n}'{yy}`, insertion order is chronological */
  quarters: Record<string, QuarterEntry>;
  confidence: number;
}

/** 8-bit single-channel pixels, row-major */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export type ConfidenceLevel = 'high' | 'medium' | 'low';
