/**
 * Persistence of the estimates and confidence tables.
 *
 * The local output directory is always written. When R2 is configured the
 * tables are pulled from the bucket before a run (so CI runs extend the
 * published table) and pushed back afterwards.
 */

import type { R2Config } from '../config';
import { parseResultsCsv, serializeConfidenceCsv, serializeEstimatesCsv } from '../export/csv';
import { ReportTable } from '../extraction/report-table';
import { readTextFile, writeTextFile } from './local';
import { downloadText, uploadText } from './r2';

export const ESTIMATES_FILE = 'extracted_estimates.csv';
export const CONFIDENCE_FILE = 'extracted_estimates_confidence.csv';

export interface ResultsLocation {
  outputDir: string;
  r2: R2Config | null;
}

export interface SavedResults {
  estimatesPath: string;
  confidencePath: string;
  uploaded: boolean;
}

async function readTable(location: ResultsLocation, name: string): Promise<string | null> {
  if (location.r2) {
    const remote = await downloadText(location.r2, name);
    if (remote !== null) {
      await writeTextFile(location.outputDir, name, remote);
      console.log(`[Storage] Downloaded ${name} from R2`);
      return remote;
    }
    console.log(`[Storage] No ${name} in R2 (first run)`);
  }
  return readTextFile(location.outputDir, name);
}

/**
 * Load the previously saved table, or an empty one when nothing was saved.
 */
export async function loadResultsTable(location: ResultsLocation): Promise<ReportTable> {
  const estimates = await readTable(location, ESTIMATES_FILE);
  if (estimates === null) return new ReportTable();

  const confidence = await readTable(location, CONFIDENCE_FILE);
  const table = parseResultsCsv(estimates, confidence ?? undefined);
  console.log(`[Storage] Loaded ${table.size} existing reports`);
  return table;
}

export async function saveResultsTable(table: ReportTable, location: ResultsLocation): Promise<SavedResults> {
  const estimatesCsv = serializeEstimatesCsv(table);
  const confidenceCsv = serializeConfidenceCsv(table);

  const estimatesPath = await writeTextFile(location.outputDir, ESTIMATES_FILE, estimatesCsv);
  const confidencePath = await writeTextFile(location.outputDir, CONFIDENCE_FILE, confidenceCsv);
  console.log(`[Storage] Saved ${table.size} reports to ${estimatesPath}`);

  if (location.r2) {
    await uploadText(location.r2, ESTIMATES_FILE, estimatesCsv);
    await uploadText(location.r2, CONFIDENCE_FILE, confidenceCsv);
    console.log(`[Storage] Uploaded results to R2 bucket ${location.r2.bucket}`);
  }

  return { estimatesPath, confidencePath, uploaded: location.r2 !== null };
}
