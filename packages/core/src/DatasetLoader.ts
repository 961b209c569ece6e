// DatasetLoader — one-time load of the indicator table (CSV → frozen Dataset)

import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { DEFAULT_DATA_URL, REQUIRED_COLUMNS } from './defaults.js';
import { isColumn, validateHeader, validateRows } from './RecordValidator.js';
import type { RawRow, ValidationError, ValidationWarning } from './RecordValidator.js';
import type { Column, DataRecord, Dataset } from './types.js';

const MAX_REPORTED_ISSUES = 5;

export class DatasetError extends Error {
  readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'DatasetError';
    this.errors = errors;
  }
}

/**
 * Freezes records and derives the value domains the widgets offer.
 * Records are copied; later changes to the input array do not leak in.
 */
export function createDataset(
  records: readonly DataRecord[],
  columns: readonly Column[] = REQUIRED_COLUMNS,
): Dataset {
  const frozen = Object.freeze(records.map(r => Object.freeze({ ...r })));
  const countries: string[] = [];
  const continents: string[] = [];
  const seenCountries = new Set<string>();
  const seenContinents = new Set<string>();
  const years = new Set<number>();

  for (const r of frozen) {
    if (!seenCountries.has(r.country)) {
      seenCountries.add(r.country);
      countries.push(r.country);
    }
    if (!seenContinents.has(r.continent)) {
      seenContinents.add(r.continent);
      continents.push(r.continent);
    }
    years.add(r.year);
  }

  return Object.freeze({
    columns: Object.freeze([...columns]),
    records: frozen,
    countries: Object.freeze(countries),
    continents: Object.freeze(continents),
    years: Object.freeze([...years].sort((a, b) => a - b)),
  });
}

export function parseDataset(csv: string): Dataset {
  const parsed = Papa.parse<RawRow>(csv, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h: string) => h.trim(),
  });

  const fields = parsed.meta.fields ?? [];
  const header = validateHeader(fields);
  if (!header.valid) {
    throw new DatasetError(summarize('Missing columns', header.errors), header.errors);
  }

  const parseErrors: ValidationError[] = parsed.errors.map(e => ({
    path: e.row !== undefined ? `rows[${e.row}]` : '',
    expected: 'well-formed CSV row',
    received: e.code,
    message: e.message,
  }));

  const rows = validateRows(parsed.data);
  const errors = [...parseErrors, ...rows.errors];
  if (errors.length > 0) {
    throw new DatasetError(summarize('Invalid data', errors), errors);
  }
  if (rows.records.length === 0) {
    throw new DatasetError('[Dashboard] Dataset has no rows', []);
  }

  reportWarnings([...header.warnings, ...rows.warnings]);

  return createDataset(rows.records, fields.filter(isColumn));
}

/**
 * Reads the CSV from an http(s) URL or a local path. Any failure here is fatal
 * to startup, so errors propagate to the caller.
 */
export async function loadDataset(source: string = DEFAULT_DATA_URL): Promise<Dataset> {
  const csv = /^https?:\/\//i.test(source) ? await fetchText(source) : await readFile(source, 'utf-8');
  const dataset = parseDataset(csv);
  console.log(
    `[Dashboard] Loaded ${dataset.records.length} records ` +
    `(${dataset.countries.length} countries, ${dataset.years.length} years) from ${source}`,
  );
  return dataset;
}

async function fetchText(url: string): Promise<string> {
  const res = await fetch(url);
  if (!res.ok) {
    throw new Error(`[Dashboard] Failed to fetch dataset from ${url}: HTTP ${res.status}`);
  }
  return res.text();
}

function summarize(prefix: string, errors: ValidationError[]): string {
  const shown = errors
    .slice(0, MAX_REPORTED_ISSUES)
    .map(e => (e.path ? `${e.path}: ${e.message}` : e.message))
    .join('; ');
  const more = errors.length > MAX_REPORTED_ISSUES ? ` (+${errors.length - MAX_REPORTED_ISSUES} more)` : '';
  return `[Dashboard] ${prefix}: ${shown}${more}`;
}

function reportWarnings(warnings: ValidationWarning[]): void {
  for (const w of warnings.slice(0, MAX_REPORTED_ISSUES)) {
    console.warn(`[Dashboard] Dataset warning at ${w.path}: ${w.message}`);
  }
  if (warnings.length > MAX_REPORTED_ISSUES) {
    console.warn(`[Dashboard] ${warnings.length - MAX_REPORTED_ISSUES} more dataset warnings suppressed`);
  }
}
