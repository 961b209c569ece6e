import type { Column, NumericField } from './types.js';

export const DEFAULT_DATA_URL =
  'https://raw.githubusercontent.com/resbaz/r-novice-gapminder-files/master/data/gapminder-FiveYearData.csv';

export const DASHBOARD_TITLE = 'Gapminder Dashboard';

/** Columns every source table must provide (reference header order) */
export const REQUIRED_COLUMNS: readonly Column[] = ['country', 'year', 'pop', 'continent', 'lifeExp', 'gdpPercap'];

export const NUMERIC_FIELDS: readonly NumericField[] = ['gdpPercap', 'lifeExp', 'pop'];

export const NUMERIC_FIELD_LABELS: Readonly<Record<NumericField, string>> = {
  gdpPercap: 'GDP Per Capita',
  lifeExp: 'Life Expectancy',
  pop: 'Population',
};

export const ROW_SLIDER = { min: 5, max: 50, step: 5, defaultValue: 10 } as const;

export const YEAR_STEP = 5;

/** Preferred initial selections; each falls back to the dataset's first value when absent */
export const DEFAULT_SELECTIONS = {
  xField: 'gdpPercap',
  yField: 'lifeExp',
  country: 'United States',
  year: 2007,
  mapVariable: 'gdpPercap',
  continent: 'Asia',
} as const satisfies {
  xField: NumericField;
  yField: NumericField;
  country: string;
  year: number;
  mapVariable: NumericField;
  continent: string;
};

export const MAP_COLOR_SCALE = 'Plasma';
