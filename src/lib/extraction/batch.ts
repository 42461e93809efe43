/**
 * Directory batch: every `YYYYMMDD-N.png` chart with a `YYYYMMDD-N.json`
 * detections sidecar is analyzed (concurrently), then scored and merged into
 * the stored table in report-date order.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { R2Config } from '../config';
import { loadResultsTable, saveResultsTable, type SavedResults } from '../storage/results';
import { mapWithConcurrency } from '../utils/concurrency';
import { cropBarRegion } from './bar-classifier';
import { decodeChartImage, encodeGrayPng } from './bar-image';
import { analyzeChart, assembleInto, type ChartAnalysis, type MergedReport } from './chart-pipeline';
import { parseDetectionsJson } from './detections';
import type { MatchOptions } from './matcher';
import { formatQuarterKey } from './quarter-label';
import { reportDateFromFilename } from './report-date';
import type { ReportTable } from './report-table';
import type { GrayImage } from './types';

export interface BatchOptions {
  outputDir: string;
  r2?: R2Config | null;
  limit?: number;
  concurrency?: number;
  match?: Partial<MatchOptions>;
  /** When set, every matched bar crop is written here as PNG */
  debugDir?: string;
  onProgress?: (done: number, total: number) => void | Promise<void>;
}

export interface FailedChart {
  name: string;
  error: string;
}

export interface BatchSummary {
  processed: number;
  skipped: string[];
  failed: FailedChart[];
  reports: MergedReport[];
  table: ReportTable;
  saved: SavedResults;
}

type ChartOutcome =
  | { kind: 'analyzed'; analysis: ChartAnalysis }
  | { kind: 'skipped'; name: string; reason: string }
  | { kind: 'failed'; name: string; error: string };

export async function listChartImages(dir: string, limit?: number): Promise<string[]> {
  const entries = await fs.readdir(dir);
  const images = entries.filter((name) => name.toLowerCase().endsWith('.png')).sort();
  return limit !== undefined && limit > 0 ? images.slice(0, limit) : images;
}

async function writeDebugCrops(
  debugDir: string,
  baseName: string,
  analysis: ChartAnalysis,
  image: GrayImage
): Promise<void> {
  for (const { pair } of analysis.classified) {
    const crop = cropBarRegion(image, pair);
    if (crop.width === 0 || crop.height === 0) continue;
    const key = formatQuarterKey(pair.quarter, pair.year).replace("'", '');
    const png = await encodeGrayPng(crop);
    await fs.mkdir(debugDir, { recursive: true });
    await fs.writeFile(path.join(debugDir, `${baseName}_bar_${key}.png`), png);
  }
}

async function analyzeChartFile(dir: string, filename: string, options: BatchOptions): Promise<ChartOutcome> {
  const baseName = filename.replace(/\.png$/i, '');
  const reportDate = reportDateFromFilename(filename);
  if (!reportDate) {
    return { kind: 'skipped', name: filename, reason: 'no report date in file name' };
  }

  let detectionsJson: string;
  try {
    detectionsJson = await fs.readFile(path.join(dir, `${baseName}.json`), 'utf-8');
  } catch {
    return { kind: 'skipped', name: filename, reason: 'no detections file' };
  }

  try {
    const { detections, imageHeight } = parseDetectionsJson(detectionsJson, `${baseName}.json`);
    const image = await decodeChartImage(await fs.readFile(path.join(dir, filename)), filename);
    const analysis = analyzeChart(
      { name: filename, reportDate, detections, image, imageHeight },
      options.match
    );

    if (options.debugDir) {
      await writeDebugCrops(options.debugDir, baseName, analysis, image);
    }
    return { kind: 'analyzed', analysis };
  } catch (error) {
    return { kind: 'failed', name: filename, error: error instanceof Error ? error.message : String(error) };
  }
}

/** Progress is advisory: a failed update is logged and the batch goes on */
async function reportProgress(options: BatchOptions, done: number, total: number): Promise<void> {
  if (!options.onProgress) return;
  try {
    await options.onProgress(done, total);
  } catch (error) {
    console.warn('[Batch] Progress update failed:', error instanceof Error ? error.message : error);
  }
}

export async function processChartDirectory(dir: string, options: BatchOptions): Promise<BatchSummary> {
  const images = await listChartImages(dir, options.limit);
  console.log(`[Batch] Processing ${images.length} chart images from ${dir}`);

  let done = 0;
  const outcomes = await mapWithConcurrency(images, options.concurrency ?? 4, async (filename) => {
    const outcome = await analyzeChartFile(dir, filename, options);
    done++;
    await reportProgress(options, done, images.length);
    return outcome;
  });

  const analyses: ChartAnalysis[] = [];
  const skipped: string[] = [];
  const failed: FailedChart[] = [];

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'analyzed':
        analyses.push(outcome.analysis);
        break;
      case 'skipped':
        console.warn(`[Batch] Skipping ${outcome.name}: ${outcome.reason}`);
        skipped.push(outcome.name);
        break;
      case 'failed':
        console.error(`[Batch] Failed ${outcome.name}: ${outcome.error}`);
        failed.push({ name: outcome.name, error: outcome.error });
        break;
    }
  }

  const location = { outputDir: options.outputDir, r2: options.r2 ?? null };
  const table = await loadResultsTable(location);
  const reports = assembleInto(table, analyses);
  const saved = await saveResultsTable(table, location);

  console.log(
    `[Batch] Done: ${reports.length} processed, ${skipped.length} skipped, ${failed.length} failed`
  );

  return { processed: reports.length, skipped, failed, reports, table, saved };
}
