// Life expectancy over time for one country

import { byCountry, filterRecords } from '../predicates.js';
import type { Dataset, LineSpec } from '../types.js';

/**
 * An unknown country yields a line chart with no points rather than an error;
 * the dropdown only offers dataset countries, but HTTP callers can send anything.
 */
export function trendChart(dataset: Dataset, country: string): LineSpec {
  const points = filterRecords(dataset.records, byCountry(country))
    .sort((a, b) => a.year - b.year)
    .map(r => ({ x: r.year, y: r.lifeExp }));

  return {
    kind: 'line',
    title: `Life Expectancy Over Time for ${country}`,
    encoding: { x: 'year', y: 'lifeExp' },
    markers: true,
    country,
    points,
  };
}
