// HTTP routes for the dashboard server
// Node http module, read-only GET routes. CORS on all responses.

import type * as http from 'node:http';
import type { DashboardServer } from './DashboardServer.js';
import { getDashboardHtml } from './dashboard.js';
import { isAllowedOrigin, queryInputs, safeDecode } from './validation.js';

function setSecurityHeaders(res: http.ServerResponse): void {
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.setHeader('X-Frame-Options', 'DENY');
  res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
}

function setCorsHeaders(
  res: http.ServerResponse,
  allowedOrigin: string,
  requestOrigin?: string,
  hostHeader?: string,
): void {
  setSecurityHeaders(res);
  // '*' allows all; otherwise reflect the origin only when the policy accepts it.
  // Requests without an Origin (non-browser) get the configured origin.
  let origin: string;
  if (allowedOrigin === '*') {
    origin = '*';
  } else if (requestOrigin === undefined) {
    origin = allowedOrigin;
  } else {
    origin = isAllowedOrigin(requestOrigin, allowedOrigin, hostHeader) ? requestOrigin : '';
  }
  if (origin) {
    res.setHeader('Access-Control-Allow-Origin', origin);
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

function json(
  res: http.ServerResponse,
  status: number,
  data: unknown,
  origin: string,
  reqOrigin?: string,
  hostHeader?: string,
): void {
  setCorsHeaders(res, origin, reqOrigin, hostHeader);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

const OUTPUT_ROUTE = /^\/outputs\/([^/]+)$/;

export function createRouteHandler(
  server: DashboardServer,
): (req: http.IncomingMessage, res: http.ServerResponse) => void {
  const cors = server.corsOrigin;
  const engine = server.getEngine();

  return (req, res) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const method = req.method?.toUpperCase() ?? 'GET';
    const reqOrigin = req.headers['origin'];
    const hostHeader = req.headers.host;

    // Scoped json helper — captures cors + reqOrigin for this request
    const respond = (status: number, data: unknown) => json(res, status, data, cors, reqOrigin, hostHeader);

    // CORS preflight
    if (method === 'OPTIONS') {
      setCorsHeaders(res, cors, reqOrigin, hostHeader);
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      if (method !== 'GET') {
        respond(405, { error: 'Method not allowed' });
        return;
      }

      // GET / — Dashboard HTML
      if (path === '/' && server.serveDashboard) {
        setCorsHeaders(res, cors, reqOrigin, hostHeader);
        res.setHeader(
          'Content-Security-Policy',
          "default-src 'self'; script-src 'unsafe-inline' https://cdn.jsdelivr.net; " +
          "style-src 'unsafe-inline' https://fonts.googleapis.com; font-src https://fonts.gstatic.com; " +
          "connect-src 'self' ws: wss: https://cdn.plot.ly; img-src 'self' data: blob:",
        );
        res.setHeader('Cache-Control', 'public, max-age=60');
        res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
        res.end(getDashboardHtml(engine.layout.title));
        return;
      }

      // GET /health — dataset size, live sessions, uptime
      if (path === '/health') {
        respond(200, {
          status: 'ok',
          records: engine.dataset.records.length,
          sessions: server.getSessionCount(),
          uptime: server.getUptime(),
        });
        return;
      }

      // GET /layout — tabs, widgets and the output → inputs bindings
      if (path === '/layout') {
        respond(200, {
          ...engine.layout,
          bindings: engine.outputIds().map(output => ({ output, inputs: engine.inputsOf(output) })),
        });
        return;
      }

      // GET /state — default widget state
      if (path === '/state') {
        respond(200, { state: engine.initialState() });
        return;
      }

      // GET /outputs/:id — stateless render from defaults + query inputs
      const match = OUTPUT_ROUTE.exec(path);
      if (match) {
        const raw = match[1] ?? '';
        const outputId = safeDecode(raw);
        if (outputId === null || !engine.hasOutput(outputId)) {
          respond(404, { error: 'unknown_output', output: (outputId ?? raw).slice(0, 100) });
          return;
        }
        const result = engine.stateFromInputs(queryInputs(url.searchParams));
        if (!result.ok) {
          respond(400, { error: 'invalid_input', message: result.error });
          return;
        }
        respond(200, { output: outputId, state: result.state, spec: engine.render(outputId, result.state) });
        return;
      }

      // 404
      respond(404, { error: 'Not found' });
    } catch (err) {
      console.error('[Dashboard Server] Unhandled route error:', err);
      respond(500, { error: 'Internal server error' });
    }
  };
}
