// Data preview: first N records as a table

import { ROW_SLIDER } from '../defaults.js';
import type { Dataset, TableSpec } from '../types.js';

/** Clamps to the slider range and snaps to its step. */
export function clampRowCount(value: number): number {
  const { min, max, step } = ROW_SLIDER;
  if (!Number.isFinite(value)) return ROW_SLIDER.defaultValue;
  const clamped = Math.min(max, Math.max(min, value));
  return min + Math.round((clamped - min) / step) * step;
}

export function previewTable(dataset: Dataset, rowCount: number): TableSpec {
  const n = clampRowCount(rowCount);
  const columns = [...dataset.columns];
  return {
    kind: 'table',
    title: `First ${n} rows`,
    columns,
    rows: dataset.records.slice(0, n).map(r => columns.map(c => r[c])),
  };
}
