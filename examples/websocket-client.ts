/**
 * Indicator dashboard WebSocket client example
 *
 * Drives the dashboard's update channel from a script instead of a browser:
 * change widgets and receive the re-rendered chart specs.
 *
 * Usage:
 *   1. Start the server: npm start
 *   2. Run this file with tsx
 */

import WebSocket from 'ws';
import type { ChartSpec, DashboardLayout, OutputId, RenderedOutputs, WidgetState } from '@indicator-dash/core';

const DASHBOARD_WS_URL = 'ws://localhost:8050';

interface ServerMessage {
  type: string;
  session?: string;
  id?: string;
  message?: string;
  layout?: DashboardLayout;
  state?: WidgetState;
  outputs?: RenderedOutputs;
}

// ─── WebSocket Client ───────────────────────────────────────────────────────

class DashboardClient {
  private ws: WebSocket | null = null;
  private handlers = new Map<string, Array<(data: ServerMessage) => void>>();

  constructor(private url: string = DASHBOARD_WS_URL) {}

  /** Resolves with the `init` message: layout, default state and first render */
  connect(): Promise<ServerMessage> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.once('message', (raw) => {
        const init: ServerMessage = JSON.parse(raw.toString());
        console.log(`[Dashboard] Connected as session ${init.session ?? '?'}`);
        ws.on('message', (next) => this.dispatch(next.toString()));
        resolve(init);
      });

      ws.on('close', () => {
        console.log('[Dashboard] WebSocket closed');
      });

      ws.on('error', (err) => {
        console.error('[Dashboard] WebSocket error:', err);
        reject(err);
      });
    });
  }

  disconnect(): void {
    this.ws?.close();
    this.ws = null;
  }

  on(type: string, handler: (data: ServerMessage) => void): void {
    const list = this.handlers.get(type) ?? [];
    list.push(handler);
    this.handlers.set(type, list);
  }

  private dispatch(raw: string): void {
    let data: ServerMessage;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      console.error('[Dashboard] Failed to parse message:', err);
      return;
    }
    const handlers = this.handlers.get(data.type) ?? [];
    for (const handler of handlers) {
      handler(data);
    }
    if (handlers.length === 0) {
      console.log(`[Dashboard] ${data.type}:`, data);
    }
  }

  private send(msg: Record<string, unknown>): void {
    if (this.ws?.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(msg));
    } else {
      console.warn('[Dashboard] WebSocket not connected');
    }
  }

  // ─── Commands ───────────────────────────────────────────────────────────

  /** Change one widget; bound outputs come back in an `outputs` message */
  setInput(id: string, value: unknown): void {
    this.send({ type: 'input', id, value });
  }

  render(output: OutputId): void {
    this.send({ type: 'render', output });
  }

  requestState(): void {
    this.send({ type: 'state' });
  }

  reset(): void {
    this.send({ type: 'reset' });
  }
}

function describeSpec(spec: ChartSpec): string {
  switch (spec.kind) {
    case 'table': return `${spec.title} (${spec.rows.length} rows)`;
    case 'scatter': return `${spec.title} (${spec.points.length} points)`;
    case 'line': return `${spec.title} (${spec.points.length} years)`;
    case 'choropleth': return `${spec.title} (${spec.locations.length} countries)`;
    case 'heatmap': return `${spec.title} (${spec.labels.join(', ')})`;
    case 'empty': return `${spec.title}: ${spec.message}`;
  }
}

// ─── Example usage ──────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const client = new DashboardClient();

  client.on('outputs', (data) => {
    for (const spec of Object.values(data.outputs ?? {})) {
      if (spec) console.log(`  ${describeSpec(spec)}`);
    }
  });

  client.on('input_error', (data) => {
    console.error(`Rejected ${data.id ?? 'input'}: ${data.message ?? ''}`);
  });

  client.on('error', (data) => {
    console.error('Server error:', data.message);
  });

  const init = await client.connect();
  console.log(`Tabs: ${init.layout?.tabs.map(t => t.label).join(' | ') ?? ''}`);

  client.setInput('x-axis', 'pop');
  client.setInput('year-slider', 1982);
  client.setInput('country-dropdown', 'Atlantis'); // rejected: not in the dataset
  client.requestState();
}

export { DashboardClient };
// Uncomment to run: main().catch(console.error);
