// Typed record predicates — every view filters the dataset through these

import type { DataRecord, Predicate } from './types.js';

export function byCountry(country: string): Predicate<DataRecord> {
  return r => r.country === country;
}

export function byYear(year: number): Predicate<DataRecord> {
  return r => r.year === year;
}

export function byContinent(continent: string): Predicate<DataRecord> {
  return r => r.continent === continent;
}

export function allOf<T>(...predicates: Predicate<T>[]): Predicate<T> {
  return item => predicates.every(p => p(item));
}

/** Returns a new array; the source sequence is never touched. */
export function filterRecords<T>(records: readonly T[], predicate: Predicate<T>): T[] {
  return records.filter(predicate);
}
