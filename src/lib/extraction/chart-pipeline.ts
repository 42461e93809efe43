/**
 * Chart extraction pipeline: per-image analysis and date-ordered assembly.
 *
 * Stages:
 * - analyzeChart: label/number partition → spatial matching → bar ensemble.
 *   No cross-image state, so charts can be analyzed concurrently.
 * - assembleReport: scoring against an explicit history → ReportRecord.
 * - assembleInto: runs assembleReport over analyses in report-date order,
 *   merging each record into the table before the next one is scored.
 */

import { classifyPair } from './bar-classifier';
import { scaleBox } from './geometry';
import { scoreReport, type ReportScore } from './confidence';
import { matchQuartersWithValues, partitionDetections, type MatchOptions } from './matcher';
import { buildQuarterMap, createReportRecord, type MergeOutcome, type ReportTable } from './report-table';
import type { ClassifiedPair, GrayImage, ReportRecord, TextDetection } from './types';

export interface ChartInput {
  /** Used in logs only */
  name: string;
  reportDate: string;
  detections: TextDetection[];
  image: GrayImage;
  /**
   * Height of the image the detections were made on. When it differs from
   * the decoded image, boxes are rescaled to decoded pixels (aspect ratio
   * is assumed preserved).
   */
  imageHeight?: number;
}

export interface ChartAnalysis {
  name: string;
  reportDate: string;
  classified: ClassifiedPair[];
  labelCount: number;
}

export interface AssembledReport {
  name: string;
  record: ReportRecord;
  score: ReportScore;
}

export interface MergedReport extends AssembledReport {
  outcome: MergeOutcome;
}

export function toImageSpace(
  detections: TextDetection[],
  imageHeight: number,
  detectionHeight?: number
): TextDetection[] {
  if (detectionHeight === undefined || detectionHeight === imageHeight) return detections;

  const factor = imageHeight / detectionHeight;
  return detections.map((detection) => ({ ...detection, box: scaleBox(detection.box, factor) }));
}

export function analyzeChart(input: ChartInput, options: Partial<MatchOptions> = {}): ChartAnalysis {
  const detections = toImageSpace(input.detections, input.image.height, input.imageHeight);
  const { labels, numbers } = partitionDetections(detections, input.image.height, options.bottomFraction);
  const pairs = matchQuartersWithValues(labels, numbers, options);

  const classified = pairs.map((pair): ClassifiedPair => ({
    pair,
    classification: classifyPair(input.image, pair),
  }));

  console.log(
    `[Extraction] ${input.name}: ${labels.length} labels, ${numbers.length} values, ${pairs.length} matched`
  );

  return {
    name: input.name,
    reportDate: input.reportDate,
    classified,
    labelCount: labels.length,
  };
}

export function assembleReport(analysis: ChartAnalysis, history: readonly ReportRecord[]): AssembledReport {
  const quarters = buildQuarterMap(analysis.classified);
  const score = scoreReport(analysis.reportDate, quarters, analysis.classified, history);
  const record = createReportRecord(analysis.reportDate, quarters, score.confidence);

  return { name: analysis.name, record, score };
}

/**
 * Score and merge analyses serially in non-decreasing report-date order.
 * Each report sees every row already in the table as its history.
 */
export function assembleInto(table: ReportTable, analyses: readonly ChartAnalysis[]): MergedReport[] {
  const ordered = [...analyses].sort((a, b) => a.reportDate.localeCompare(b.reportDate));
  const merged: MergedReport[] = [];

  for (const analysis of ordered) {
    const assembled = assembleReport(analysis, table.records);
    const outcome = table.merge(assembled.record);

    console.log(
      `[Extraction] ${assembled.record.reportDate} ${outcome}: ` +
      `${Object.keys(assembled.record.quarters).length} quarters, ` +
      `${assembled.score.confidence}% (${assembled.score.level})`
    );
    merged.push({ ...assembled, outcome });
  }

  return merged;
}
