// Pairwise correlation of the numeric indicators within one continent

import { NUMERIC_FIELDS } from '../defaults.js';
import { byContinent, filterRecords } from '../predicates.js';
import { correlationMatrix } from '../stats.js';
import type { Dataset, HeatmapSpec } from '../types.js';

export function correlationHeatmap(dataset: Dataset, continent: string): HeatmapSpec {
  const rows = filterRecords(dataset.records, byContinent(continent));
  const labels = [...NUMERIC_FIELDS];
  const matrix = correlationMatrix(labels.map(field => rows.map(r => r[field])));

  return {
    kind: 'heatmap',
    title: `Correlation Matrix for ${continent}`,
    labels,
    // NaN has no JSON form; undefined coefficients travel as null
    matrix: matrix.map(row => row.map(v => (Number.isNaN(v) ? null : v))),
    colorLabel: 'Correlation',
    annotate: true,
  };
}
