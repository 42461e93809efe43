/**
 * P/E ratio report from the saved estimates table.
 * Usage: npm run pe-ratio -- --prices prices.csv [--type forward|mix|trailing-like] [--output-dir dir]
 *
 * prices.csv needs `Date` and `Price` columns.
 */

import { promises as fs } from 'fs';
import { parseArgs } from 'util';
import { z } from 'zod';
import { calculatePeRatios, type PricePoint } from '../src/lib/analysis/pe-ratio';
import { loadConfig } from '../src/lib/config';
import { splitCsvRows } from '../src/lib/export/csv';
import { loadResultsTable } from '../src/lib/storage/results';

const windowSchema = z.enum(['forward', 'mix', 'trailing-like']);

function parsePrices(csv: string): PricePoint[] {
  const [header, ...rows] = splitCsvRows(csv);
  const dateIndex = header?.indexOf('Date') ?? -1;
  const priceIndex = header?.indexOf('Price') ?? -1;
  if (dateIndex < 0 || priceIndex < 0) {
    throw new Error('Prices CSV needs Date and Price columns');
  }

  return rows.flatMap((row) => {
    const date = row[dateIndex]?.trim().slice(0, 10) ?? '';
    const price = Number(row[priceIndex]);
    return date && Number.isFinite(price) ? [{ date, price }] : [];
  });
}

async function main() {
  const config = loadConfig();
  const { values } = parseArgs({
    options: {
      prices: { type: 'string' },
      type: { type: 'string', default: 'forward' },
      'output-dir': { type: 'string', default: config.outputDir },
    },
  });

  if (!values.prices) throw new Error('--prices is required');
  const type = windowSchema.parse(values.type);

  const prices = parsePrices(await fs.readFile(values.prices, 'utf-8'));
  const table = await loadResultsTable({ outputDir: values['output-dir'] ?? config.outputDir, r2: config.r2 });
  const rows = calculatePeRatios(table.records, prices, type);

  console.log('Report_Date,Price_Date,Price,EPS_4Q_Sum,PE_Ratio,Type');
  for (const row of rows) {
    console.log(
      [row.reportDate, row.priceDate, row.price, row.epsSum.toFixed(2), row.peRatio.toFixed(2), row.type].join(',')
    );
  }
}

main().catch((err) => {
  console.error('[PE] Error:', err);
  process.exit(1);
});
