import { describe, it, expect } from 'vitest';
import { validateHeader, validateRows } from '../src/RecordValidator.js';
import type { RawRow } from '../src/RecordValidator.js';

function validRow(): RawRow {
  return {
    country: 'Borduria',
    year: '1952',
    pop: '1000000',
    continent: 'Europe',
    lifeExp: '58.2',
    gdpPercap: '2500.75',
  };
}

describe('RecordValidator — header', () => {
  it('accepts the six required columns in any order', () => {
    const result = validateHeader(['gdpPercap', 'lifeExp', 'continent', 'pop', 'year', 'country']);
    expect(result.valid).toBe(true);
    expect(result.warnings).toHaveLength(0);
  });

  it('reports each missing column', () => {
    const result = validateHeader(['country', 'year']);
    expect(result.valid).toBe(false);
    expect(result.errors.map(e => e.path)).toEqual([
      'columns.pop',
      'columns.continent',
      'columns.lifeExp',
      'columns.gdpPercap',
    ]);
  });
});

describe('RecordValidator — rows', () => {
  it('converts a valid row', () => {
    const result = validateRows([validRow()]);
    expect(result.valid).toBe(true);
    expect(result.records).toEqual([
      { country: 'Borduria', continent: 'Europe', year: 1952, lifeExp: 58.2, pop: 1000000, gdpPercap: 2500.75 },
    ]);
  });

  it('non-integer year → error with path', () => {
    const result = validateRows([validRow(), { ...validRow(), year: '1952.5' }]);
    expect(result.valid).toBe(false);
    const err = result.errors.find(e => e.path === 'rows[1].year');
    expect(err).toBeDefined();
    expect(err!.expected).toBe('integer');
    expect(err!.received).toBe('"1952.5"');
    expect(result.records).toHaveLength(1);
  });

  it('non-numeric lifeExp → error', () => {
    const result = validateRows([{ ...validRow(), lifeExp: 'n/a' }]);
    expect(result.errors).toEqual([
      { path: 'rows[0].lifeExp', expected: 'number', received: '"n/a"', message: 'lifeExp must be a number' },
    ]);
  });

  it('empty country → error', () => {
    const result = validateRows([{ ...validRow(), country: '  ' }]);
    expect(result.errors[0]).toEqual({
      path: 'rows[0].country',
      expected: 'non-empty string',
      received: 'empty',
      message: 'country must be a non-empty string',
    });
  });

  it('missing continent → error', () => {
    const row = validRow();
    delete row['continent'];
    const result = validateRows([row]);
    expect(result.errors[0]!.path).toBe('rows[0].continent');
    expect(result.errors[0]!.received).toBe('undefined');
  });

  it('negative population → error', () => {
    const result = validateRows([{ ...validRow(), pop: '-5' }]);
    expect(result.errors[0]!.path).toBe('rows[0].pop');
  });

  it('fractional population → warning, record kept', () => {
    const result = validateRows([{ ...validRow(), pop: '1000.5' }]);
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([{ path: 'rows[0].pop', message: 'pop 1000.5 is not a whole number' }]);
    expect(result.records[0]!.pop).toBe(1000.5);
  });

  it('trims cell whitespace', () => {
    const result = validateRows([{ ...validRow(), country: ' Borduria ', year: ' 1952 ' }]);
    expect(result.records[0]!.country).toBe('Borduria');
    expect(result.records[0]!.year).toBe(1952);
  });
});
