import { createExtractionWorker } from './extraction-worker';

const extractionWorker = createExtractionWorker();

console.log('[Workers] Starting chart extraction workers...');
console.log('[Workers] Extraction worker:', extractionWorker.name);

async function shutdown() {
  console.log('[Workers] Shutting down...');
  await extractionWorker.close();
  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown().catch((err) => {
    console.error('[Workers] Shutdown failed:', err);
    process.exit(1);
  });
});
process.on('SIGTERM', () => {
  shutdown().catch((err) => {
    console.error('[Workers] Shutdown failed:', err);
    process.exit(1);
  });
});
