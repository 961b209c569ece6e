// Session — one browser connection's widget state
// The state object is immutable; each accepted change swaps in a new one.

import { randomUUID } from 'node:crypto';
import type { RenderedOutputs, UpdateEngine, UpdateResult, WidgetState } from '@indicator-dash/core';

export class Session {
  readonly id = randomUUID();
  private current: WidgetState;

  constructor(private readonly engine: UpdateEngine) {
    this.current = engine.initialState();
  }

  get state(): WidgetState {
    return this.current;
  }

  /** On rejection the previous state stays in place. */
  update(inputId: string, value: unknown): UpdateResult {
    const result = this.engine.applyInput(this.current, inputId, value);
    if (result.ok) this.current = result.state;
    return result;
  }

  reset(): RenderedOutputs {
    this.current = this.engine.initialState();
    return this.engine.renderAll(this.current);
  }

  renderAll(): RenderedOutputs {
    return this.engine.renderAll(this.current);
  }
}
