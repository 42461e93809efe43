import path from 'path';

const FILENAME_DATE = /^(\d{4})(\d{2})(\d{2})(?:\D|$)/;

/**
 * Report date encoded in a chart file name, e.g. `20161209-6.png` →
 * `2016-12-09`. Returns null when the prefix is not a real calendar date.
 */
export function reportDateFromFilename(filename: string): string | null {
  const match = FILENAME_DATE.exec(path.basename(filename));
  if (!match) return null;

  const [, year, month, day] = match;
  if (!year || !month || !day) return null;
  if (!isCalendarDate(Number(year), Number(month), Number(day))) return null;

  return `${year}-${month}-${day}`;
}

export function isCalendarDate(year: number, month: number, day: number): boolean {
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  return isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}
