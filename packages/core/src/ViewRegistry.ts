// ViewRegistry — declarative tabs, widgets and outputs, built once from the dataset
// Every widget knows its domain and the WidgetState key it writes.

import {
  DASHBOARD_TITLE,
  DEFAULT_SELECTIONS,
  NUMERIC_FIELDS,
  NUMERIC_FIELD_LABELS,
  ROW_SLIDER,
  YEAR_STEP,
} from './defaults.js';
import { clampRowCount } from './handlers/preview.js';
import type {
  DashboardLayout,
  Dataset,
  DropdownOption,
  DropdownWidget,
  InputId,
  NumericField,
  SliderWidget,
  StateKey,
  TabSpec,
  WidgetSpec,
  WidgetState,
} from './types.js';

export type ApplyResult =
  | { ok: true; state: WidgetState }
  | { ok: false; error: string };

export interface InputControl {
  readonly widget: WidgetSpec;
  /** Returns a new state; `state` is never modified */
  apply(state: WidgetState, raw: unknown): ApplyResult;
}

export function isNumericField(value: unknown): value is NumericField {
  return typeof value === 'string' && (NUMERIC_FIELDS as readonly string[]).includes(value);
}

function withValue<K extends StateKey>(state: WidgetState, key: K, value: WidgetState[K]): WidgetState {
  return Object.freeze({ ...state, [key]: value });
}

function toNumber(raw: unknown): number {
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'string' && raw.trim() !== '') return Number(raw);
  return NaN;
}

function nearest(value: number, candidates: readonly number[]): number {
  let best = candidates[0] ?? value;
  for (const c of candidates) {
    if (Math.abs(c - value) < Math.abs(best - value)) best = c;
  }
  return best;
}

function sliderControl(widget: SliderWidget, snap: (n: number) => number): InputControl {
  return {
    widget,
    apply(state, raw) {
      const n = toNumber(raw);
      if (!Number.isFinite(n)) {
        return { ok: false, error: `${widget.id} expects a number` };
      }
      const clamped = Math.min(widget.max, Math.max(widget.min, n));
      return { ok: true, state: withValue(state, widget.stateKey, snap(clamped)) };
    },
  };
}

function checkOption(widget: DropdownWidget, raw: unknown): string | null {
  if (typeof raw !== 'string') return null;
  return widget.options.some(o => o.value === raw) ? raw : null;
}

function rejectOption(widget: DropdownWidget, raw: unknown): ApplyResult {
  const shown = typeof raw === 'string' ? `"${raw.slice(0, 100)}"` : typeof raw;
  return { ok: false, error: `${shown} is not an option of ${widget.id}` };
}

function fieldDropdown(
  widget: DropdownWidget & { stateKey: 'xField' | 'yField' | 'mapVariable' },
): InputControl {
  const key = widget.stateKey;
  return {
    widget,
    apply(state, raw) {
      const value = checkOption(widget, raw);
      if (!isNumericField(value)) return rejectOption(widget, raw);
      return { ok: true, state: withValue(state, key, value) };
    },
  };
}

function categoryDropdown(widget: DropdownWidget & { stateKey: 'country' | 'continent' }): InputControl {
  const key = widget.stateKey;
  return {
    widget,
    apply(state, raw) {
      const value = checkOption(widget, raw);
      if (value === null) return rejectOption(widget, raw);
      return { ok: true, state: withValue(state, key, value) };
    },
  };
}

function options(values: readonly string[], label: (v: string) => string = v => v): DropdownOption[] {
  return values.map(v => ({ label: label(v), value: v }));
}

export class ViewRegistry {
  readonly layout: DashboardLayout;
  private readonly controls = new Map<string, InputControl>();
  private readonly defaultState: WidgetState;

  constructor(dataset: Dataset) {
    const years = dataset.years;
    const firstYear = years[0] ?? DEFAULT_SELECTIONS.year;
    const lastYear = years[years.length - 1] ?? DEFAULT_SELECTIONS.year;

    this.defaultState = Object.freeze({
      rowCount: ROW_SLIDER.defaultValue,
      xField: DEFAULT_SELECTIONS.xField,
      yField: DEFAULT_SELECTIONS.yField,
      country: prefer(DEFAULT_SELECTIONS.country, dataset.countries),
      year: years.includes(DEFAULT_SELECTIONS.year) ? DEFAULT_SELECTIONS.year : lastYear,
      mapVariable: DEFAULT_SELECTIONS.mapVariable,
      continent: prefer(DEFAULT_SELECTIONS.continent, dataset.continents),
    });
    const d = this.defaultState;

    const rowSlider: SliderWidget = {
      kind: 'slider',
      id: 'row-slider',
      label: 'Preview Data: Select number of rows to display',
      stateKey: 'rowCount',
      min: ROW_SLIDER.min,
      max: ROW_SLIDER.max,
      step: ROW_SLIDER.step,
      marks: stepMarks(ROW_SLIDER.min, ROW_SLIDER.max, ROW_SLIDER.step),
      defaultValue: d.rowCount,
    };
    const axisOptions = options(NUMERIC_FIELDS);
    const xAxis = { kind: 'dropdown', id: 'x-axis', label: 'Select X-axis', stateKey: 'xField', options: axisOptions, defaultValue: d.xField, clearable: false } as const satisfies DropdownWidget;
    const yAxis = { kind: 'dropdown', id: 'y-axis', label: 'Select Y-axis', stateKey: 'yField', options: axisOptions, defaultValue: d.yField, clearable: false } as const satisfies DropdownWidget;
    const countryDropdown = {
      kind: 'dropdown',
      id: 'country-dropdown',
      label: 'Select a country',
      stateKey: 'country',
      options: options(dataset.countries),
      defaultValue: d.country,
      clearable: false,
    } as const satisfies DropdownWidget;
    const yearSlider: SliderWidget = {
      kind: 'slider',
      id: 'year-slider',
      label: 'Select Year',
      stateKey: 'year',
      min: firstYear,
      max: lastYear,
      step: YEAR_STEP,
      marks: years.map(y => ({ value: y, label: String(y) })),
      defaultValue: d.year,
    };
    const mapVariable = {
      kind: 'dropdown',
      id: 'map-variable',
      label: 'Select Variable',
      stateKey: 'mapVariable',
      options: options(NUMERIC_FIELDS, v => (isNumericField(v) ? NUMERIC_FIELD_LABELS[v] : v)),
      defaultValue: d.mapVariable,
      clearable: false,
    } as const satisfies DropdownWidget;
    const continentDropdown = {
      kind: 'dropdown',
      id: 'continent-dropdown',
      label: 'Select Continent',
      stateKey: 'continent',
      options: options(dataset.continents),
      defaultValue: d.continent,
      clearable: false,
    } as const satisfies DropdownWidget;

    const controls: InputControl[] = [
      sliderControl(rowSlider, clampRowCount),
      fieldDropdown(xAxis),
      fieldDropdown(yAxis),
      categoryDropdown(countryDropdown),
      // Snap to a year that exists so the map never filters to nothing
      sliderControl(yearSlider, n => nearest(n, years)),
      fieldDropdown(mapVariable),
      categoryDropdown(continentDropdown),
    ];
    for (const c of controls) this.controls.set(c.widget.id, c);

    const tabs: TabSpec[] = [
      {
        id: 'introduction',
        label: 'Introduction',
        heading: 'Gapminder Dataset Overview',
        description:
          'The Gapminder dataset includes indicators such as GDP per capita, life expectancy, and population ' +
          "across countries over time. It's useful for understanding global development trends.",
        widgets: [rowSlider],
        outputs: [{ id: 'data-preview', kind: 'table' }],
      },
      {
        id: 'scatterplots',
        label: 'Scatterplots',
        heading: 'Scatterplot Explorer',
        widgets: [xAxis, yAxis],
        outputs: [{ id: 'scatterplot', kind: 'graph' }],
      },
      {
        id: 'trend-analysis',
        label: 'Trend Analysis',
        heading: 'Trend Analysis',
        widgets: [countryDropdown],
        outputs: [{ id: 'trend-chart', kind: 'graph' }],
      },
      {
        id: 'map-visualization',
        label: 'Map Visualization',
        heading: 'Map Visualization',
        widgets: [yearSlider, mapVariable],
        outputs: [{ id: 'map-chart', kind: 'graph' }],
      },
      {
        id: 'correlation-analysis',
        label: 'Correlation Analysis',
        heading: 'Correlation Analysis',
        widgets: [continentDropdown],
        outputs: [{ id: 'correlation-matrix', kind: 'graph' }],
      },
    ];

    this.layout = { title: DASHBOARD_TITLE, tabs };
  }

  defaults(): WidgetState {
    return this.defaultState;
  }

  inputIds(): InputId[] {
    return [...this.controls.values()].map(c => c.widget.id);
  }

  getWidget(id: string): WidgetSpec | undefined {
    return this.controls.get(id)?.widget;
  }

  apply(state: WidgetState, id: string, raw: unknown): ApplyResult {
    const control = this.controls.get(id);
    if (!control) {
      return { ok: false, error: `Unknown input "${id.slice(0, 100)}"` };
    }
    return control.apply(state, raw);
  }
}

function prefer(preferred: string, domain: readonly string[]): string {
  return domain.includes(preferred) ? preferred : (domain[0] ?? preferred);
}

function stepMarks(min: number, max: number, step: number): { value: number; label: string }[] {
  const marks: { value: number; label: string }[] = [];
  for (let v = min; v <= max; v += step) marks.push({ value: v, label: String(v) });
  return marks;
}
