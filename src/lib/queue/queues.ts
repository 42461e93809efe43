/**
 * BullMQ queue for chart extraction jobs.
 */

import { Queue } from 'bullmq';
import { z } from 'zod';
import { getRedisConnection } from './connection';

export const EXTRACTION_QUEUE = 'chart-extraction';

export const extractionJobSchema = z.object({
  inputDir: z.string().min(1),
  outputDir: z.string().min(1),
  limit: z.number().int().positive().optional(),
  debugDir: z.string().min(1).optional(),
});

export type ExtractionJobData = z.infer<typeof extractionJobSchema>;

let extractionQueue: Queue<ExtractionJobData> | null = null;

export function getExtractionQueue(): Queue<ExtractionJobData> {
  if (!extractionQueue) {
    extractionQueue = new Queue<ExtractionJobData>(EXTRACTION_QUEUE, { connection: getRedisConnection() });
  }
  return extractionQueue;
}

export async function enqueueExtraction(data: ExtractionJobData): Promise<string | undefined> {
  const job = await getExtractionQueue().add('extract', extractionJobSchema.parse(data), {
    removeOnComplete: { count: 50 },
    removeOnFail: { count: 20 },
  });
  return job.id;
}
