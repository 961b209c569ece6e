// Shared test data — a small made-up indicator table

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseDataset } from '../src/DatasetLoader.js';
import type { Dataset } from '../src/types.js';

export const SAMPLE_CSV_PATH = fileURLToPath(new URL('./fixtures/indicators.csv', import.meta.url));

export function sampleCsv(): string {
  return readFileSync(SAMPLE_CSV_PATH, 'utf-8');
}

export function sampleDataset(): Dataset {
  return parseDataset(sampleCsv());
}
