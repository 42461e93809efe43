/**
 * CSV form of the cumulative estimates table.
 *
 * Estimates table: `Report_Date,Q1'14,Q2'14,...`, one row per report date,
 * estimate values suffixed with `*`, absent quarters left empty.
 * Confidence table: `Report_Date,Confidence`.
 */

import { isIsoDate } from '../extraction/report-date';
import { createReportRecord, ReportTable } from '../extraction/report-table';
import type { QuarterEntry } from '../extraction/types';

export const DATE_COLUMN = 'Report_Date';
export const CONFIDENCE_COLUMN = 'Confidence';
export const ESTIMATE_MARKER = '*';

export function csvCell(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function splitCsvLine(line: string): string[] {
  const cells: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      cells.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  cells.push(current);
  return cells;
}

export function splitCsvRows(csv: string): string[][] {
  return csv
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map(splitCsvLine);
}

export function formatEstimateCell(entry: QuarterEntry | undefined): string {
  if (!entry) return '';
  return `${entry.value}${entry.isEstimate ? ESTIMATE_MARKER : ''}`;
}

export function serializeEstimatesCsv(table: ReportTable): string {
  const columns = table.quarterColumns;
  const lines = [[DATE_COLUMN, ...columns].map(csvCell).join(',')];

  for (const record of table.records) {
    const cells = [record.reportDate, ...columns.map((key) => formatEstimateCell(record.quarters[key]))];
    lines.push(cells.map(csvCell).join(','));
  }

  return lines.join('\n') + '\n';
}

export function serializeConfidenceCsv(table: ReportTable): string {
  const lines = [`${DATE_COLUMN},${CONFIDENCE_COLUMN}`];
  for (const record of table.records) {
    lines.push(`${record.reportDate},${record.confidence}`);
  }
  return lines.join('\n') + '\n';
}

export function parseEstimateCell(cell: string): QuarterEntry | null {
  const trimmed = cell.trim();
  if (!trimmed) return null;

  const isEstimate = trimmed.endsWith(ESTIMATE_MARKER);
  const value = Number(isEstimate ? trimmed.slice(0, -ESTIMATE_MARKER.length) : trimmed);
  if (!Number.isFinite(value)) return null;

  return { value, isEstimate };
}

function parseConfidenceTable(csv: string): Map<string, number> {
  const confidences = new Map<string, number>();
  const [header, ...rows] = splitCsvRows(csv);
  if (!header) return confidences;

  const dateIndex = header.indexOf(DATE_COLUMN);
  const confidenceIndex = header.indexOf(CONFIDENCE_COLUMN);
  if (dateIndex < 0 || confidenceIndex < 0) return confidences;

  for (const row of rows) {
    const date = row[dateIndex]?.trim();
    const confidence = Number(row[confidenceIndex]);
    if (date && Number.isFinite(confidence)) confidences.set(date, confidence);
  }
  return confidences;
}

/**
 * Rebuild a table from its CSV form. A `Confidence` column in the estimates
 * table itself is honoured too; the separate confidence table wins when both
 * carry a value. Unreadable cells and rows are skipped.
 */
export function parseResultsCsv(estimatesCsv: string, confidenceCsv?: string): ReportTable {
  const table = new ReportTable();
  const [header, ...rows] = splitCsvRows(estimatesCsv);
  if (!header) return table;

  const dateIndex = header.indexOf(DATE_COLUMN);
  if (dateIndex < 0) {
    throw new Error(`Estimates CSV has no ${DATE_COLUMN} column`);
  }
  const inlineConfidenceIndex = header.indexOf(CONFIDENCE_COLUMN);
  const confidences = confidenceCsv ? parseConfidenceTable(confidenceCsv) : new Map<string, number>();
  table.addColumns(header.filter((_, index) => index !== dateIndex && index !== inlineConfidenceIndex));

  for (const row of rows) {
    const reportDate = row[dateIndex]?.trim() ?? '';
    if (!isIsoDate(reportDate)) {
      console.warn(`[CSV] Skipping row with invalid report date "${reportDate}"`);
      continue;
    }

    const quarters: Record<string, QuarterEntry> = {};
    header.forEach((column, index) => {
      if (index === dateIndex || index === inlineConfidenceIndex) return;
      const entry = parseEstimateCell(row[index] ?? '');
      if (entry) quarters[column] = entry;
    });

    const inline = inlineConfidenceIndex >= 0 ? Number(row[inlineConfidenceIndex]) : Number.NaN;
    const confidence = confidences.get(reportDate) ?? (Number.isFinite(inline) ? inline : 0);

    table.merge(createReportRecord(reportDate, quarters, confidence));
  }

  return table;
}
