/**
 * Quarter label normalization (e.g. "Q1'14" → quarter 1 of 2014).
 *
 * OCR regularly confuses Q/O/0 and 1/I/l on chart axis labels. Instead of
 * patching regular expressions for each confusion, every detection is
 * expanded into the finite set of readings its confusable characters allow,
 * and each reading is tested against the `Q<1-4><yy>` template.
 */

import type { QuarterLabel, QuarterNumber, TextDetection } from './types';

interface ConfusionClass {
  members: string;
  /** Members the label template can actually use */
  readings: string[];
}

export const CONFUSION_CLASSES: readonly ConfusionClass[] = [
  { members: 'QqOo0', readings: ['Q', '0'] },
  { members: '1Il', readings: ['1'] },
];

/** Labels are short; anything past this is noise and is not expanded */
const MAX_EXPANDED_CHARS = 8;

const LABEL_TEMPLATE = /^Q([1-4])(\d{2})/;
const QUARTER_KEY_PATTERN = /^Q([1-4])'(\d{2})$/;

/**
 * Readings for one character. The literal reading (when the template can use
 * it) comes first so the most faithful interpretation is tried first.
 */
function readingsFor(char: string): string[] {
  const cls = CONFUSION_CLASSES.find((c) => c.members.includes(char));
  if (!cls) return [char];
  if (cls.readings.includes(char)) {
    return [char, ...cls.readings.filter((r) => r !== char)];
  }
  return cls.readings;
}

/**
 * Every reading of `text` implied by the confusion classes, literal first.
 */
export function expandConfusions(text: string): string[] {
  let readings: string[] = [''];

  for (const char of text.slice(0, MAX_EXPANDED_CHARS)) {
    const options = readingsFor(char);
    const next: string[] = [];
    for (const prefix of readings) {
      for (const option of options) {
        next.push(prefix + option);
      }
    }
    readings = next;
  }

  return readings;
}

export function stripLabelNoise(text: string): string {
  return text.replace(/[^A-Za-z0-9]/g, '');
}

/**
 * Parse a raw OCR string as a quarter label. Returns null when no reading
 * fits the template.
 */
export function parseQuarterText(text: string): { quarter: QuarterNumber; year: number } | null {
  const skeleton = stripLabelNoise(text);
  if (skeleton.length < 4) return null;

  for (const reading of expandConfusions(skeleton)) {
    const match = LABEL_TEMPLATE.exec(reading);
    if (!match) continue;

    const quarter = toQuarterNumber(Number(match[1]));
    const shortYear = Number(match[2]);
    if (quarter === null || !Number.isInteger(shortYear)) continue;

    return { quarter, year: 2000 + shortYear };
  }

  return null;
}

export function normalizeQuarterLabel(detection: TextDetection): QuarterLabel | null {
  const parsed = parseQuarterText(detection.text);
  if (!parsed) return null;

  return {
    quarter: parsed.quarter,
    year: parsed.year,
    box: detection.box,
    sourceText: detection.text,
  };
}

export function toQuarterNumber(value: number): QuarterNumber | null {
  if (value === 1 || value === 2 || value === 3 || value === 4) return value;
  return null;
}

export function formatQuarterKey(quarter: QuarterNumber, year: number): string {
  const shortYear = String(((year % 100) + 100) % 100).padStart(2, '0');
  return `Q${quarter}'${shortYear}`;
}

export function parseQuarterKey(key: string): { quarter: QuarterNumber; year: number } | null {
  const match = QUARTER_KEY_PATTERN.exec(key.trim());
  if (!match) return null;
  const quarter = toQuarterNumber(Number(match[1]));
  if (quarter === null) return null;
  return { quarter, year: 2000 + Number(match[2]) };
}

/**
 * Chronological comparator for quarter keys. Unparseable keys sort first.
 */
export function compareQuarterKeys(a: string, b: string): number {
  const pa = parseQuarterKey(a);
  const pb = parseQuarterKey(b);
  const ya = pa ? pa.year * 10 + pa.quarter : 0;
  const yb = pb ? pb.year * 10 + pb.quarter : 0;
  if (ya !== yb) return ya - yb;
  return a.localeCompare(b);
}
