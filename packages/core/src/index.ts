// @indicator-dash/core — main entry point

export { UpdateEngine } from './UpdateEngine.js';
export type { UpdateResult, StateResult } from './UpdateEngine.js';
export { ViewRegistry, isNumericField } from './ViewRegistry.js';
export type { ApplyResult, InputControl } from './ViewRegistry.js';
export { createDataset, parseDataset, loadDataset, DatasetError } from './DatasetLoader.js';
export { validateHeader, validateRows } from './RecordValidator.js';
export type { ValidationError, ValidationWarning, ValidationResult, RowValidationResult, RawRow } from './RecordValidator.js';
export { byCountry, byYear, byContinent, allOf, filterRecords } from './predicates.js';
export { pearson, correlationMatrix } from './stats.js';
export {
  DEFAULT_DATA_URL,
  DASHBOARD_TITLE,
  REQUIRED_COLUMNS,
  NUMERIC_FIELDS,
  NUMERIC_FIELD_LABELS,
  ROW_SLIDER,
  DEFAULT_SELECTIONS,
} from './defaults.js';
export * from './handlers/index.js';
export * from './types.js';
