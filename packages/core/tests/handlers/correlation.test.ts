import { describe, it, expect } from 'vitest';
import { correlationHeatmap } from '../../src/handlers/correlation.js';
import { sampleDataset } from '../fixtures.js';

const ds = sampleDataset();

describe('correlationHeatmap', () => {
  it('labels, title and annotation', () => {
    const chart = correlationHeatmap(ds, 'Asia');
    expect(chart.title).toBe('Correlation Matrix for Asia');
    expect(chart.labels).toEqual(['gdpPercap', 'lifeExp', 'pop']);
    expect(chart.colorLabel).toBe('Correlation');
    expect(chart.annotate).toBe(true);
  });

  it('linear indicators correlate perfectly', () => {
    const chart = correlationHeatmap(ds, 'Asia');
    for (const row of chart.matrix) {
      for (const cell of row) {
        expect(cell).not.toBeNull();
        expect(cell).toBeCloseTo(1, 10);
      }
    }
  });

  it('is symmetric with a unit diagonal for every continent with two or more rows', () => {
    for (const continent of ['Europe', 'Asia', 'Americas']) {
      const { matrix } = correlationHeatmap(ds, continent);
      expect(matrix).toHaveLength(3);
      for (let i = 0; i < 3; i++) {
        expect(matrix[i]).toHaveLength(3);
        expect(matrix[i]![i]).toBe(1);
        for (let j = 0; j < 3; j++) {
          expect(matrix[i]![j]).toBe(matrix[j]![i]);
        }
      }
    }
  });

  it('a single-row continent yields null cells instead of failing', () => {
    const { matrix } = correlationHeatmap(ds, 'Oceania');
    expect(matrix).toEqual([
      [null, null, null],
      [null, null, null],
      [null, null, null],
    ]);
  });

  it('an unknown continent yields null cells', () => {
    expect(correlationHeatmap(ds, 'Antarctica').matrix.flat().every(v => v === null)).toBe(true);
  });
});
