import { Worker, type Job } from 'bullmq';
import { loadConfig } from '../src/lib/config';
import type { BatchOptions, BatchSummary } from '../src/lib/extraction/batch';
import { getRedisConnection } from '../src/lib/queue/connection';
import { EXTRACTION_QUEUE, extractionJobSchema, type ExtractionJobData } from '../src/lib/queue/queues';

export interface ExtractionJobResult {
  status: 'completed';
  processed: number;
  skipped: number;
  failed: number;
}

type ProcessDirectory = (dir: string, options: BatchOptions) => Promise<BatchSummary>;

/**
 * Job body, separate from the Worker so it can run without Redis.
 */
export async function runExtractionJob(
  data: unknown,
  updateProgress: (progress: number) => Promise<void>,
  processDirectory?: ProcessDirectory
): Promise<ExtractionJobResult> {
  const { inputDir, outputDir, limit, debugDir } = extractionJobSchema.parse(data);
  const config = loadConfig();
  console.log(`[Extraction] Processing ${inputDir}`);

  const run = processDirectory ?? (await import('../src/lib/extraction/batch')).processChartDirectory;
  const summary = await run(inputDir, {
    outputDir,
    limit,
    debugDir,
    r2: config.r2,
    concurrency: config.concurrency,
    onProgress: (done, total) => updateProgress(Math.round((done / Math.max(total, 1)) * 90)),
  });

  await updateProgress(100);
  console.log(`[Extraction] Done ${inputDir}: ${summary.processed} reports`);
  return {
    status: 'completed',
    processed: summary.processed,
    skipped: summary.skipped.length,
    failed: summary.failed.length,
  };
}

export function createExtractionWorker(): Worker<ExtractionJobData, ExtractionJobResult> {
  const worker = new Worker<ExtractionJobData, ExtractionJobResult>(
    EXTRACTION_QUEUE,
    (job: Job<ExtractionJobData>) => runExtractionJob(job.data, (progress) => job.updateProgress(progress)),
    {
      connection: getRedisConnection(),
      // Reports are scored against earlier ones, so batches must not interleave
      concurrency: 1,
      removeOnComplete: { count: 50 },
      removeOnFail: { count: 20 },
    }
  );

  worker.on('completed', (job) => {
    console.log(`[Extraction] Job ${job.id} completed`);
  });

  worker.on('failed', (job, err) => {
    console.error(`[Extraction] Job ${job?.id} failed:`, err.message);
  });

  return worker;
}
