/**
 * Chart extraction script.
 * Usage: npm run extract -- [--input-dir dir] [--output-dir dir] [--limit n] [--debug-dir dir] [--queue]
 *
 * With --queue the batch is handed to the extraction worker when Redis is
 * reachable; otherwise it runs inline.
 */

import { parseArgs } from 'util';
import { loadConfig } from '../src/lib/config';
import { getConfidenceLevel } from '../src/lib/extraction/confidence';

async function main() {
  const config = loadConfig();
  const { values } = parseArgs({
    options: {
      'input-dir': { type: 'string', default: config.inputDir },
      'output-dir': { type: 'string', default: config.outputDir },
      'debug-dir': { type: 'string' },
      limit: { type: 'string' },
      queue: { type: 'boolean', default: false },
    },
  });

  const inputDir = values['input-dir'] ?? config.inputDir;
  const outputDir = values['output-dir'] ?? config.outputDir;
  const debugDir = values['debug-dir'];
  const limit = values.limit !== undefined ? Number.parseInt(values.limit, 10) : undefined;
  if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
    throw new Error(`--limit must be a positive integer, got "${values.limit}"`);
  }

  if (values.queue) {
    const { checkRedisHealth } = await import('../src/lib/queue/connection');
    if (await checkRedisHealth()) {
      const { enqueueExtraction, getExtractionQueue } = await import('../src/lib/queue/queues');
      const jobId = await enqueueExtraction({ inputDir, outputDir, limit, debugDir });
      console.log(`[Extract] Queued job ${jobId} for ${inputDir}`);
      await getExtractionQueue().close();
      return;
    }
    console.warn('[Extract] Redis unavailable, running inline');
  }

  const { processChartDirectory } = await import('../src/lib/extraction/batch');
  const summary = await processChartDirectory(inputDir, {
    outputDir,
    limit,
    debugDir,
    r2: config.r2,
    concurrency: config.concurrency,
  });

  for (const report of summary.reports) {
    const { reportDate, confidence } = report.record;
    console.log(`[Extract] ${reportDate}: ${confidence}% (${getConfidenceLevel(confidence)})`);
  }
  console.log(`[Extract] ${summary.table.size} reports in ${summary.saved.estimatesPath}`);

  if (summary.failed.length > 0) {
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error('[Extract] Error:', err);
  process.exit(1);
});
