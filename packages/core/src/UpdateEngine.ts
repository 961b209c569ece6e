// UpdateEngine — dispatch table from outputs to handlers, built once at startup
// input change → bound outputs → handler(dataset, state) → ChartSpec

import { ALL_VIEWS } from './handlers/index.js';
import type { ViewBinding } from './handlers/index.js';
import { ViewRegistry } from './ViewRegistry.js';
import type {
  ChartSpec,
  DashboardLayout,
  Dataset,
  InputId,
  OutputId,
  RenderedOutputs,
  WidgetState,
} from './types.js';

export type UpdateResult =
  | { ok: true; state: WidgetState; outputs: RenderedOutputs }
  | { ok: false; error: string };

export type StateResult =
  | { ok: true; state: WidgetState }
  | { ok: false; error: string };

export class UpdateEngine {
  readonly dataset: Dataset;
  readonly registry: ViewRegistry;
  private readonly bindings = new Map<string, ViewBinding>();
  /** input id → outputs it drives */
  private readonly dependents = new Map<string, OutputId[]>();

  constructor(dataset: Dataset, views: readonly ViewBinding[] = ALL_VIEWS) {
    this.dataset = dataset;
    this.registry = new ViewRegistry(dataset);

    const known = new Set<string>(this.registry.inputIds());
    for (const view of views) {
      if (this.bindings.has(view.output)) {
        throw new Error(`[Dashboard] Output "${view.output}" is bound twice`);
      }
      for (const input of view.inputs) {
        if (!known.has(input)) {
          throw new Error(`[Dashboard] Output "${view.output}" depends on unknown input "${input}"`);
        }
        const list = this.dependents.get(input) ?? [];
        list.push(view.output);
        this.dependents.set(input, list);
      }
      this.bindings.set(view.output, view);
    }
  }

  get layout(): DashboardLayout {
    return this.registry.layout;
  }

  initialState(): WidgetState {
    return this.registry.defaults();
  }

  outputIds(): OutputId[] {
    return [...this.bindings.values()].map(b => b.output);
  }

  hasOutput(id: string): id is OutputId {
    return this.bindings.has(id);
  }

  /** Outputs to recompute when `inputId` changes */
  affectedOutputs(inputId: string): OutputId[] {
    return [...(this.dependents.get(inputId) ?? [])];
  }

  /**
   * Validates the new value, then re-renders only the outputs bound to that input.
   * The incoming state is left as it was.
   */
  applyInput(state: WidgetState, inputId: string, raw: unknown): UpdateResult {
    const applied = this.registry.apply(state, inputId, raw);
    if (!applied.ok) return applied;

    const outputs: RenderedOutputs = {};
    for (const output of this.affectedOutputs(inputId)) {
      outputs[output] = this.render(output, applied.state);
    }
    return { ok: true, state: applied.state, outputs };
  }

  /**
   * Defaults overlaid with raw input values, e.g. from a query string.
   * Keys that name no widget (cache busters and the like) are skipped.
   */
  stateFromInputs(inputs: Readonly<Record<string, unknown>>): StateResult {
    let state = this.initialState();
    for (const [id, raw] of Object.entries(inputs)) {
      if (!this.registry.getWidget(id)) continue;
      const applied = this.registry.apply(state, id, raw);
      if (!applied.ok) return applied;
      state = applied.state;
    }
    return { ok: true, state };
  }

  /** A failing handler is contained to its own output as an `empty` spec. */
  render(outputId: OutputId, state: WidgetState): ChartSpec {
    const binding = this.bindings.get(outputId);
    if (!binding) {
      throw new Error(`[Dashboard] No handler bound to output "${outputId}"`);
    }
    try {
      return binding.render(this.dataset, state);
    } catch (err) {
      console.error(`[Dashboard] Handler for "${outputId}" failed:`, err);
      return {
        kind: 'empty',
        title: binding.fallbackTitle(state),
        message: err instanceof Error ? err.message : String(err),
      };
    }
  }

  renderAll(state: WidgetState): RenderedOutputs {
    const outputs: RenderedOutputs = {};
    for (const id of this.outputIds()) {
      outputs[id] = this.render(id, state);
    }
    return outputs;
  }

  /** Inputs a given output reads, in binding order */
  inputsOf(outputId: OutputId): readonly InputId[] {
    return this.bindings.get(outputId)?.inputs ?? [];
  }
}
