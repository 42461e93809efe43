import type { NumericCandidate, TextDetection } from './types';

/** Values at or above this read as years on the axis, not EPS figures */
export const YEAR_VALUE_THRESHOLD = 2000;

const DECIMAL_PATTERN = /^-?\d+(?:\.\d+)?$/;

/**
 * Parse a detection's text as a decimal number. Currency signs, thousands
 * separators and surrounding whitespace are ignored.
 */
export function parseDecimal(text: string): number | null {
  const cleaned = text.trim().replace(/[$,\s]/g, '');
  if (!DECIMAL_PATTERN.test(cleaned)) return null;

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

export function toNumericCandidate(detection: TextDetection): NumericCandidate | null {
  const value = parseDecimal(detection.text);
  if (value === null || value >= YEAR_VALUE_THRESHOLD) return null;

  return {
    value,
    box: detection.box,
    sourceText: detection.text,
  };
}
