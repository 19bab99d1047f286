// ──────────────────────────────────────────
// Script: Sample — write a synthetic snapshot CSV
//
// Usage:
//   npx tsx scripts/sample.ts [out.csv] [start] [end]
//
// Env vars:
//   SAMPLE_SEED   — optional, makes the output reproducible
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { loadConfig } from '../src/config';
import { SampleGenerator } from '../src/domains/ingestion/sample';
import { DEFAULT_SAMPLE_RANGE } from '../src/domains/ingestion/dataset.service';
import { parseCalendarDate } from '../src/domains/ingestion/validator';
import { toCsv } from '../src/domains/analytics/export';
import { createLogger } from '../src/shared/logger';

const log = createLogger('Sample');

function sample(): void {
  const config = loadConfig();
  const [out, from = DEFAULT_SAMPLE_RANGE.start, to = DEFAULT_SAMPLE_RANGE.end] = process.argv.slice(2);

  const start = parseCalendarDate(from);
  const end = parseCalendarDate(to);
  if (start === null || end === null) {
    throw new Error(`Expected calendar date bounds, got ${from} and ${to}`);
  }

  const dataset = new SampleGenerator().generate({ start, end, seed: config.sampleSeed });
  const csv = toCsv(dataset);

  if (!out) {
    process.stdout.write(csv);
    return;
  }

  const target = path.resolve(process.cwd(), out);
  fs.writeFileSync(target, csv, 'utf-8');
  log.info(`Wrote ${dataset.length} rows (${start} → ${end}) to ${target}`);
}

try {
  sample();
} catch (err) {
  log.error('Failed:', err);
  process.exit(1);
}
