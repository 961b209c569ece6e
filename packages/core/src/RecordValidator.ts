// RecordValidator — validates raw CSV rows before they become DataRecords

import { REQUIRED_COLUMNS } from './defaults.js';
import type { Column, DataRecord } from './types.js';

export interface ValidationError {
  path: string;
  expected: string;
  received: string;
  message: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface RowValidationResult extends ValidationResult {
  records: DataRecord[];
}

export type RawRow = Record<string, string | undefined>;

export function validateHeader(fields: readonly string[]): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const present = new Set(fields);

  for (const column of REQUIRED_COLUMNS) {
    if (!present.has(column)) {
      errors.push({
        path: `columns.${column}`,
        expected: 'column present in header',
        received: 'missing',
        message: `column "${column}" is required`,
      });
    }
  }

  for (const field of fields) {
    if (!isColumn(field)) {
      warnings.push({ path: `columns.${field}`, message: `unknown column "${field}" is ignored` });
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Converts and validates every row. Rows with a missing or non-numeric field are
 * rejected rather than displayed as-is; a valid result carries one record per row.
 */
export function validateRows(rows: readonly RawRow[]): RowValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const records: DataRecord[] = [];

  rows.forEach((row, index) => {
    const at = (field: string) => `rows[${index}].${field}`;
    const errorCount = errors.length;

    const country = text(row['country']);
    if (country === null) {
      errors.push(missing(at('country'), 'non-empty string', row['country']));
    }

    const continent = text(row['continent']);
    if (continent === null) {
      errors.push(missing(at('continent'), 'non-empty string', row['continent']));
    }

    const year = numeric(row['year']);
    if (year === null || !Number.isInteger(year)) {
      errors.push({
        path: at('year'),
        expected: 'integer',
        received: describeCell(row['year']),
        message: 'year must be an integer',
      });
    }

    const pop = numeric(row['pop']);
    if (pop === null || pop < 0) {
      errors.push({
        path: at('pop'),
        expected: 'non-negative number',
        received: describeCell(row['pop']),
        message: 'pop must be a non-negative number',
      });
    } else if (!Number.isInteger(pop)) {
      warnings.push({ path: at('pop'), message: `pop ${pop} is not a whole number` });
    }

    const lifeExp = numeric(row['lifeExp']);
    if (lifeExp === null) {
      errors.push({
        path: at('lifeExp'),
        expected: 'number',
        received: describeCell(row['lifeExp']),
        message: 'lifeExp must be a number',
      });
    }

    const gdpPercap = numeric(row['gdpPercap']);
    if (gdpPercap === null || gdpPercap < 0) {
      errors.push({
        path: at('gdpPercap'),
        expected: 'non-negative number',
        received: describeCell(row['gdpPercap']),
        message: 'gdpPercap must be a non-negative number',
      });
    }

    if (
      errors.length === errorCount &&
      country !== null && continent !== null &&
      year !== null && pop !== null && lifeExp !== null && gdpPercap !== null
    ) {
      records.push({ country, continent, year, lifeExp, pop, gdpPercap });
    }
  });

  return { valid: errors.length === 0, errors, warnings, records };
}

export function isColumn(value: string): value is Column {
  return (REQUIRED_COLUMNS as readonly string[]).includes(value);
}

// ── Helpers ──

function text(raw: string | undefined): string | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  return trimmed === '' ? null : trimmed;
}

function numeric(raw: string | undefined): number | null {
  const s = text(raw);
  if (s === null) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function missing(path: string, expected: string, raw: string | undefined): ValidationError {
  const field = path.slice(path.lastIndexOf('.') + 1);
  return { path, expected, received: describeCell(raw), message: `${field} must be a non-empty string` };
}

function describeCell(raw: string | undefined): string {
  if (raw === undefined) return 'undefined';
  if (raw.trim() === '') return 'empty';
  return JSON.stringify(raw.length > 40 ? `${raw.slice(0, 40)}…` : raw);
}
