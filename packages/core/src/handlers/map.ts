// Choropleth of one variable for one year

import { MAP_COLOR_SCALE } from '../defaults.js';
import { byYear, filterRecords } from '../predicates.js';
import type { ChoroplethSpec, Dataset, NumericField } from '../types.js';

export function mapChart(dataset: Dataset, year: number, variable: NumericField): ChoroplethSpec {
  const rows = filterRecords(dataset.records, byYear(year));
  return {
    kind: 'choropleth',
    title: `${variable} in ${year}`,
    // Name → geography matching is the renderer's job; unmatched names stay uncolored
    locationMode: 'country names',
    variable,
    year,
    colorScale: MAP_COLOR_SCALE,
    locations: rows.map(r => r.country),
    values: rows.map(r => r[variable]),
    hover: rows.map(r => r.country),
  };
}
