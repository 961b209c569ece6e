import { describe, it, expect } from 'vitest';
import { ViewRegistry } from '../src/ViewRegistry.js';
import { createDataset } from '../src/DatasetLoader.js';
import { sampleDataset } from './fixtures.js';

const ds = sampleDataset();

describe('ViewRegistry — layout', () => {
  it('declares five tabs in order, each with its outputs', () => {
    const { layout } = new ViewRegistry(ds);
    expect(layout.title).toBe('Gapminder Dashboard');
    expect(layout.tabs.map(t => t.label)).toEqual([
      'Introduction',
      'Scatterplots',
      'Trend Analysis',
      'Map Visualization',
      'Correlation Analysis',
    ]);
    expect(layout.tabs.map(t => t.outputs.map(o => o.id))).toEqual([
      ['data-preview'],
      ['scatterplot'],
      ['trend-chart'],
      ['map-chart'],
      ['correlation-matrix'],
    ]);
  });

  it('takes dropdown and slider domains from the dataset', () => {
    const registry = new ViewRegistry(ds);
    const country = registry.getWidget('country-dropdown');
    expect(country?.kind === 'dropdown' && country.options.map(o => o.value)).toEqual(ds.countries);

    const year = registry.getWidget('year-slider');
    expect(year?.kind).toBe('slider');
    if (year?.kind === 'slider') {
      expect(year.min).toBe(1952);
      expect(year.max).toBe(1962);
      expect(year.step).toBe(5);
      expect(year.marks).toEqual([
        { value: 1952, label: '1952' },
        { value: 1957, label: '1957' },
        { value: 1962, label: '1962' },
      ]);
    }
  });

  it('labels the map variables', () => {
    const widget = new ViewRegistry(ds).getWidget('map-variable');
    expect(widget?.kind === 'dropdown' && widget.options).toEqual([
      { label: 'GDP Per Capita', value: 'gdpPercap' },
      { label: 'Life Expectancy', value: 'lifeExp' },
      { label: 'Population', value: 'pop' },
    ]);
  });

  it('row slider marks every step from 5 to 50', () => {
    const widget = new ViewRegistry(ds).getWidget('row-slider');
    expect(widget?.kind === 'slider' && widget.marks.map(m => m.value)).toEqual([5, 10, 15, 20, 25, 30, 35, 40, 45, 50]);
  });
});

describe('ViewRegistry — defaults', () => {
  it('falls back to dataset values when preferred selections are absent', () => {
    expect(new ViewRegistry(ds).defaults()).toEqual({
      rowCount: 10,
      xField: 'gdpPercap',
      yField: 'lifeExp',
      country: 'Borduria',
      year: 1962,
      mapVariable: 'gdpPercap',
      continent: 'Asia',
    });
  });

  it('prefers United States and 2007 when present', () => {
    const registry = new ViewRegistry(createDataset([
      { country: 'Canada', continent: 'Americas', year: 2002, lifeExp: 79, pop: 31000000, gdpPercap: 33000 },
      { country: 'United States', continent: 'Americas', year: 2007, lifeExp: 78, pop: 301000000, gdpPercap: 42000 },
    ]));
    const d = registry.defaults();
    expect(d.country).toBe('United States');
    expect(d.year).toBe(2007);
    expect(d.continent).toBe('Americas');
  });
});

describe('ViewRegistry — apply', () => {
  const registry = new ViewRegistry(ds);
  const base = registry.defaults();

  it('returns a new state and leaves the old one untouched', () => {
    const result = registry.apply(base, 'x-axis', 'pop');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.state.xField).toBe('pop');
      expect(result.state).not.toBe(base);
      expect(Object.isFrozen(result.state)).toBe(true);
    }
    expect(base.xField).toBe('gdpPercap');
  });

  it('rejects a value outside a dropdown domain', () => {
    const result = registry.apply(base, 'y-axis', 'country');
    expect(result).toEqual({ ok: false, error: '"country" is not an option of y-axis' });
  });

  it('rejects a non-string dropdown value', () => {
    expect(registry.apply(base, 'continent-dropdown', 3)).toEqual({
      ok: false,
      error: 'number is not an option of continent-dropdown',
    });
  });

  it('rejects an unknown input', () => {
    expect(registry.apply(base, 'colour-picker', 'red')).toEqual({ ok: false, error: 'Unknown input "colour-picker"' });
  });

  it('clamps and snaps the row slider', () => {
    const apply = (raw: unknown) => {
      const r = registry.apply(base, 'row-slider', raw);
      return r.ok ? r.state.rowCount : null;
    };
    expect(apply(25)).toBe(25);
    expect(apply('35')).toBe(35);
    expect(apply(99)).toBe(50);
    expect(apply(0)).toBe(5);
    expect(apply(22)).toBe(20);
    expect(apply('many')).toBeNull();
  });

  it('snaps the year slider to a dataset year', () => {
    const year = (raw: unknown) => {
      const r = registry.apply(base, 'year-slider', raw);
      return r.ok ? r.state.year : null;
    };
    expect(year(1957)).toBe(1957);
    expect(year(1959)).toBe(1957);
    expect(year(1960)).toBe(1962);
    expect(year(2020)).toBe(1962);
    expect(year(null)).toBeNull();
  });
});
