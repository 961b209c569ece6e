// Scatterplot over the full dataset

import type { Dataset, NumericField, ScatterSpec } from '../types.js';

export function scatterTitle(xField: NumericField, yField: NumericField): string {
  return `Scatterplot of ${yField} vs ${xField}`;
}

export function scatterplot(dataset: Dataset, xField: NumericField, yField: NumericField): ScatterSpec {
  return {
    kind: 'scatter',
    title: scatterTitle(xField, yField),
    encoding: { x: xField, y: yField, color: 'continent', size: 'pop', hover: 'country' },
    points: dataset.records.map(r => ({
      x: r[xField],
      y: r[yField],
      color: r.continent,
      size: r.pop,
      label: r.country,
    })),
  };
}
