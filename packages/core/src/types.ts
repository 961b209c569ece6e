// Core types for the indicator dashboard

// ─────────────────────────────────────────────────────────────────────────────
// Dataset
// ─────────────────────────────────────────────────────────────────────────────

export interface DataRecord {
  country: string;
  continent: string;
  year: number;
  lifeExp: number;
  pop: number;
  gdpPercap: number;
}

export type Column = keyof DataRecord;

/** Fields that can be placed on an axis, a map color, or a correlation matrix */
export type NumericField = 'gdpPercap' | 'lifeExp' | 'pop';

export type CellValue = string | number;

export interface Dataset {
  /** Header order of the source CSV */
  readonly columns: readonly Column[];
  readonly records: readonly Readonly<DataRecord>[];
  /** First-appearance order */
  readonly countries: readonly string[];
  /** First-appearance order */
  readonly continents: readonly string[];
  /** Ascending */
  readonly years: readonly number[];
}

export type Predicate<T> = (item: T) => boolean;

// ─────────────────────────────────────────────────────────────────────────────
// Widget state
// ─────────────────────────────────────────────────────────────────────────────

export interface WidgetState {
  readonly rowCount: number;
  readonly xField: NumericField;
  readonly yField: NumericField;
  readonly country: string;
  readonly year: number;
  readonly mapVariable: NumericField;
  readonly continent: string;
}

export type StateKey = keyof WidgetState;

export type InputId =
  | 'row-slider'
  | 'x-axis'
  | 'y-axis'
  | 'country-dropdown'
  | 'year-slider'
  | 'map-variable'
  | 'continent-dropdown';

export type OutputId =
  | 'data-preview'
  | 'scatterplot'
  | 'trend-chart'
  | 'map-chart'
  | 'correlation-matrix';

// ─────────────────────────────────────────────────────────────────────────────
// Layout (view registry)
// ─────────────────────────────────────────────────────────────────────────────

export interface SliderMark {
  value: number;
  label: string;
}

export interface SliderWidget {
  kind: 'slider';
  id: InputId;
  label: string;
  stateKey: 'rowCount' | 'year';
  min: number;
  max: number;
  step: number;
  marks: SliderMark[];
  defaultValue: number;
}

export interface DropdownOption {
  label: string;
  value: string;
}

export interface DropdownWidget {
  kind: 'dropdown';
  id: InputId;
  label: string;
  stateKey: 'xField' | 'yField' | 'mapVariable' | 'country' | 'continent';
  options: DropdownOption[];
  defaultValue: string;
  clearable: false;
}

export type WidgetSpec = SliderWidget | DropdownWidget;

export interface OutputSpec {
  id: OutputId;
  kind: 'table' | 'graph';
}

export interface TabSpec {
  id: string;
  label: string;
  heading: string;
  description?: string;
  widgets: WidgetSpec[];
  outputs: OutputSpec[];
}

export interface DashboardLayout {
  title: string;
  tabs: TabSpec[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Chart specs (handler output)
// ─────────────────────────────────────────────────────────────────────────────

export interface TableSpec {
  kind: 'table';
  title: string;
  columns: Column[];
  rows: CellValue[][];
}

export interface ScatterPoint {
  x: number;
  y: number;
  color: string;
  size: number;
  label: string;
}

export interface ScatterSpec {
  kind: 'scatter';
  title: string;
  encoding: { x: NumericField; y: NumericField; color: 'continent'; size: 'pop'; hover: 'country' };
  points: ScatterPoint[];
}

export interface LinePoint {
  x: number;
  y: number;
}

export interface LineSpec {
  kind: 'line';
  title: string;
  encoding: { x: 'year'; y: 'lifeExp' };
  markers: boolean;
  country: string;
  points: LinePoint[];
}

export interface ChoroplethSpec {
  kind: 'choropleth';
  title: string;
  locationMode: 'country names';
  variable: NumericField;
  year: number;
  colorScale: string;
  locations: string[];
  values: number[];
  hover: string[];
}

export interface HeatmapSpec {
  kind: 'heatmap';
  title: string;
  labels: NumericField[];
  /** Symmetric; null where the coefficient is undefined */
  matrix: (number | null)[][];
  colorLabel: string;
  annotate: boolean;
}

/** Stand-in for an output whose handler failed */
export interface EmptySpec {
  kind: 'empty';
  title: string;
  message: string;
}

export type ChartSpec = TableSpec | ScatterSpec | LineSpec | ChoroplethSpec | HeatmapSpec | EmptySpec;

export type ChartKind = ChartSpec['kind'];

export type RenderedOutputs = Partial<Record<OutputId, ChartSpec>>;
