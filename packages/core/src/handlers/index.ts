import { previewTable } from './preview.js';
import { scatterplot, scatterTitle } from './scatter.js';
import { trendChart } from './trend.js';
import { mapChart } from './map.js';
import { correlationHeatmap } from './correlation.js';
import type { ChartSpec, Dataset, InputId, OutputId, WidgetState } from '../types.js';

export * from './preview.js';
export * from './scatter.js';
export * from './trend.js';
export * from './map.js';
export * from './correlation.js';

/** One row of the dispatch table: an output, the inputs that drive it, and its handler */
export interface ViewBinding {
  output: OutputId;
  inputs: readonly InputId[];
  /** Title shown when the handler fails */
  fallbackTitle(state: WidgetState): string;
  render(dataset: Dataset, state: WidgetState): ChartSpec;
}

/** All five views in tab order */
export const ALL_VIEWS: readonly ViewBinding[] = [
  {
    output: 'data-preview',
    inputs: ['row-slider'],
    fallbackTitle: () => 'Data preview',
    render: (dataset, state) => previewTable(dataset, state.rowCount),
  },
  {
    output: 'scatterplot',
    inputs: ['x-axis', 'y-axis'],
    fallbackTitle: state => scatterTitle(state.xField, state.yField),
    render: (dataset, state) => scatterplot(dataset, state.xField, state.yField),
  },
  {
    output: 'trend-chart',
    inputs: ['country-dropdown'],
    fallbackTitle: state => `Life Expectancy Over Time for ${state.country}`,
    render: (dataset, state) => trendChart(dataset, state.country),
  },
  {
    output: 'map-chart',
    inputs: ['year-slider', 'map-variable'],
    fallbackTitle: state => `${state.mapVariable} in ${state.year}`,
    render: (dataset, state) => mapChart(dataset, state.year, state.mapVariable),
  },
  {
    output: 'correlation-matrix',
    inputs: ['continent-dropdown'],
    fallbackTitle: state => `Correlation Matrix for ${state.continent}`,
    render: (dataset, state) => correlationHeatmap(dataset, state.continent),
  },
];
