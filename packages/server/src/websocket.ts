// WebSocket update channel for the dashboard server
// Same port via HTTP upgrade. JSON messages with `type` field; one Session per connection.

import type * as http from 'node:http';
import { WebSocketServer, WebSocket } from 'ws';
import type { DashboardServer } from './DashboardServer.js';
import { Session } from './Session.js';
import { isAllowedOrigin, parseClientMessage } from './validation.js';

function send(ws: WebSocket, data: Record<string, unknown>): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

export interface WebSocketHandle {
  cleanup: () => void;
  sessionCount: () => number;
}

const MAX_WS_PAYLOAD = 64 * 1024; // widget messages are tiny
const MAX_WS_CONNECTIONS = 100;
const HEARTBEAT_INTERVAL_MS = 30_000;

export function createWebSocketHandler(
  httpServer: http.Server,
  server: DashboardServer,
): WebSocketHandle {
  const wss = new WebSocketServer({ server: httpServer, maxPayload: MAX_WS_PAYLOAD });
  const engine = server.getEngine();
  const sessions = new Map<WebSocket, Session>();

  // Heartbeat: ping every 30s, drop clients that missed the previous pong
  const aliveMap = new WeakMap<WebSocket, boolean>();

  const heartbeatInterval = setInterval(() => {
    for (const ws of wss.clients) {
      if (ws.readyState === WebSocket.OPEN) {
        if (aliveMap.get(ws) === false) {
          ws.terminate();
          continue;
        }
        aliveMap.set(ws, false);
        ws.ping();
      }
    }
  }, HEARTBEAT_INTERVAL_MS);

  wss.on('connection', (ws, req) => {
    if (wss.clients.size > MAX_WS_CONNECTIONS) {
      ws.close(1013, 'Server at capacity');
      return;
    }

    // Origin check: validate against CORS policy (skip for non-browser / missing origin)
    const wsOrigin = req.headers['origin'];
    if (wsOrigin && !isAllowedOrigin(wsOrigin, server.corsOrigin, req.headers.host)) {
      ws.close(1008, 'Origin not allowed');
      return;
    }

    const session = new Session(engine);
    sessions.set(ws, session);
    aliveMap.set(ws, true);
    console.log(`[Dashboard Server] Session ${session.id} connected`);

    ws.on('pong', () => {
      aliveMap.set(ws, true);
    });

    ws.on('close', () => {
      sessions.delete(ws);
      console.log(`[Dashboard Server] Session ${session.id} disconnected`);
    });

    send(ws, {
      type: 'init',
      session: session.id,
      layout: engine.layout,
      state: session.state,
      outputs: session.renderAll(),
    });

    ws.on('message', (raw) => {
      const parsed = parseClientMessage(raw.toString());
      if (!parsed.ok) {
        send(ws, { type: 'error', message: parsed.error });
        return;
      }
      const msg = parsed.message;

      switch (msg.type) {
        case 'input': {
          const id = msg['id'];
          if (typeof id !== 'string') {
            send(ws, { type: 'error', message: 'Missing "id" field' });
            break;
          }
          const result = session.update(id, msg['value']);
          if (!result.ok) {
            send(ws, { type: 'input_error', id: id.slice(0, 100), message: result.error });
            break;
          }
          send(ws, { type: 'outputs', state: result.state, outputs: result.outputs });
          break;
        }

        case 'render': {
          const output = msg['output'];
          if (typeof output !== 'string' || !engine.hasOutput(output)) {
            send(ws, { type: 'error', message: 'Unknown output' });
            break;
          }
          send(ws, {
            type: 'outputs',
            state: session.state,
            outputs: { [output]: engine.render(output, session.state) },
          });
          break;
        }

        case 'state': {
          send(ws, { type: 'state_result', state: session.state });
          break;
        }

        case 'reset': {
          const outputs = session.reset();
          send(ws, { type: 'outputs', state: session.state, outputs });
          break;
        }

        default:
          send(ws, { type: 'error', message: `Unknown message type: "${msg.type.slice(0, 100)}"` });
      }
    });
  });

  return {
    cleanup: () => {
      clearInterval(heartbeatInterval);
      for (const ws of wss.clients) ws.terminate();
      wss.close();
    },
    sessionCount: () => sessions.size,
  };
}
