import { describe, it, expect } from 'vitest';
import { mapChart } from '../../src/handlers/map.js';
import { NUMERIC_FIELDS } from '../../src/defaults.js';
import { sampleDataset } from '../fixtures.js';

const ds = sampleDataset();

describe('mapChart', () => {
  it('keys one location per record of the year', () => {
    const chart = mapChart(ds, 1962, 'gdpPercap');
    expect(chart.title).toBe('gdpPercap in 1962');
    expect(chart.locationMode).toBe('country names');
    expect(chart.colorScale).toBe('Plasma');
    expect(chart.locations).toEqual(['Borduria', 'Syldavia', 'Khemed', 'Nuevo Rico']);
    expect(chart.values).toEqual([3900, 2600, 1100, 8000]);
    expect(chart.hover).toEqual(chart.locations);
  });

  it('row count equals the records of that year for every year and variable', () => {
    for (const year of ds.years) {
      for (const variable of NUMERIC_FIELDS) {
        const chart = mapChart(ds, year, variable);
        const expected = ds.records.filter(r => r.year === year).length;
        expect(chart.locations).toHaveLength(expected);
        expect(chart.values).toHaveLength(expected);
      }
    }
  });

  it('colors by the chosen variable', () => {
    expect(mapChart(ds, 1957, 'lifeExp').values).toEqual([61.5, 57.5, 42, 52]);
  });
});
