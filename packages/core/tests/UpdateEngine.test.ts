import { describe, it, expect, vi } from 'vitest';
import { UpdateEngine } from '../src/UpdateEngine.js';
import { ALL_VIEWS } from '../src/handlers/index.js';
import type { ViewBinding } from '../src/handlers/index.js';
import type { InputId } from '../src/types.js';
import { sampleDataset } from './fixtures.js';

const ds = sampleDataset();

describe('UpdateEngine — dispatch table', () => {
  it('binds every output to its inputs', () => {
    const engine = new UpdateEngine(ds);
    expect(engine.outputIds()).toEqual(['data-preview', 'scatterplot', 'trend-chart', 'map-chart', 'correlation-matrix']);
    expect(engine.inputsOf('map-chart')).toEqual(['year-slider', 'map-variable']);
    expect(engine.affectedOutputs('y-axis')).toEqual(['scatterplot']);
    expect(engine.affectedOutputs('nothing')).toEqual([]);
  });

  it('refuses a binding to an unknown input', () => {
    const bad: ViewBinding = {
      ...ALL_VIEWS[0]!,
      output: 'scatterplot',
      inputs: ['row-slider', 'zoom' as string as InputId],
    };
    expect(() => new UpdateEngine(ds, [bad])).toThrow('depends on unknown input "zoom"');
  });

  it('refuses an output bound twice', () => {
    expect(() => new UpdateEngine(ds, [ALL_VIEWS[0]!, ALL_VIEWS[0]!])).toThrow('"data-preview" is bound twice');
  });
});

describe('UpdateEngine — applyInput', () => {
  const engine = new UpdateEngine(ds);
  const initial = engine.initialState();

  it('recomputes only the outputs bound to the changed input', () => {
    const result = engine.applyInput(initial, 'continent-dropdown', 'Europe');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(Object.keys(result.outputs)).toEqual(['correlation-matrix']);
      expect(result.outputs['correlation-matrix']?.title).toBe('Correlation Matrix for Europe');
      expect(result.state.continent).toBe('Europe');
    }
    expect(initial.continent).toBe('Asia');
  });

  it('scatter output follows both axis inputs', () => {
    const first = engine.applyInput(initial, 'x-axis', 'pop');
    expect(first.ok).toBe(true);
    if (!first.ok) return;
    const second = engine.applyInput(first.state, 'y-axis', 'gdpPercap');
    expect(second.ok).toBe(true);
    if (second.ok) {
      expect(second.outputs['scatterplot']?.title).toBe('Scatterplot of gdpPercap vs pop');
    }
  });

  it('reports invalid values without rendering', () => {
    expect(engine.applyInput(initial, 'country-dropdown', 'Atlantis')).toEqual({
      ok: false,
      error: '"Atlantis" is not an option of country-dropdown',
    });
  });

  it('sessions stay independent', () => {
    const a = engine.applyInput(initial, 'row-slider', 5);
    const b = engine.applyInput(initial, 'row-slider', 20);
    expect(a.ok && a.state.rowCount).toBe(5);
    expect(b.ok && b.state.rowCount).toBe(20);
    expect(initial.rowCount).toBe(10);
  });
});

describe('UpdateEngine — render', () => {
  it('renders every output from the initial state', () => {
    const engine = new UpdateEngine(ds);
    const outputs = engine.renderAll(engine.initialState());
    expect(outputs['data-preview']?.kind).toBe('table');
    expect(outputs['scatterplot']?.kind).toBe('scatter');
    expect(outputs['trend-chart']?.title).toBe('Life Expectancy Over Time for Borduria');
    expect(outputs['map-chart']?.title).toBe('gdpPercap in 1962');
    expect(outputs['correlation-matrix']?.kind).toBe('heatmap');
  });

  it('contains a failing handler to its own output', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failing: ViewBinding = {
      ...ALL_VIEWS[4]!,
      render: () => {
        throw new Error('degenerate input');
      },
    };
    const engine = new UpdateEngine(ds, [...ALL_VIEWS.slice(0, 4), failing]);
    const outputs = engine.renderAll(engine.initialState());
    expect(outputs['correlation-matrix']).toEqual({
      kind: 'empty',
      title: 'Correlation Matrix for Asia',
      message: 'degenerate input',
    });
    expect(outputs['data-preview']?.kind).toBe('table');
    expect(error).toHaveBeenCalledTimes(1);
    error.mockRestore();
  });
});

describe('UpdateEngine — stateFromInputs', () => {
  const engine = new UpdateEngine(ds);

  it('overlays raw inputs on the defaults', () => {
    const result = engine.stateFromInputs({ 'year-slider': '1952', 'map-variable': 'pop' });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.state.year).toBe(1952);
      expect(result.state.mapVariable).toBe('pop');
      expect(result.state.rowCount).toBe(10);
    }
  });

  it('stops at the first invalid input', () => {
    expect(engine.stateFromInputs({ 'x-axis': 'year' })).toEqual({
      ok: false,
      error: '"year" is not an option of x-axis',
    });
  });

  it('skips keys that are not widgets', () => {
    const result = engine.stateFromInputs({ _: '1700000000000', 'row-slider': '15' });
    expect(result).toEqual({ ok: true, state: { ...engine.initialState(), rowCount: 15 } });
  });

  it('still rejects a bad value next to an unknown key', () => {
    expect(engine.stateFromInputs({ _: '1', 'y-axis': 'country' })).toEqual({
      ok: false,
      error: '"country" is not an option of y-axis',
    });
  });
});
