// DashboardServer — HTTP + WebSocket transport for the indicator dashboard

import * as http from 'node:http';
import { UpdateEngine, type Dataset } from '@indicator-dash/core';
import { createRouteHandler } from './routes.js';
import { createWebSocketHandler, type WebSocketHandle } from './websocket.js';

export const DEFAULT_PORT = 8050;
export const DEFAULT_HOST = '127.0.0.1';

export interface ServerConfig {
  port?: number;
  host?: string;
  corsOrigin?: string;
  serveDashboard?: boolean;
}

export class DashboardServer {
  private readonly engine: UpdateEngine;
  private readonly server: http.Server;
  readonly port: number;
  private readonly host: string;
  private readonly startedAt = Date.now();
  private wsHandle: WebSocketHandle | null = null;
  readonly corsOrigin: string;
  readonly serveDashboard: boolean;

  constructor(dataset: Dataset, config: ServerConfig = {}) {
    this.port = config.port ?? DEFAULT_PORT;
    this.host = config.host ?? DEFAULT_HOST;
    // Same-host pages are accepted as well, see isAllowedOrigin
    this.corsOrigin = config.corsOrigin ?? `http://${this.host}:${this.port}`;
    this.serveDashboard = config.serveDashboard ?? true;

    // Dispatch table is built once; every session shares it and the read-only dataset
    this.engine = new UpdateEngine(dataset);

    const routeHandler = createRouteHandler(this);
    this.server = http.createServer(routeHandler);
  }

  async start(): Promise<void> {
    // Wire up WebSocket upgrade
    this.wsHandle = createWebSocketHandler(this.server, this);

    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        const addr = this.getAddress();
        console.log(`[Dashboard Server] Listening on http://${addr.host}:${addr.port}/`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (this.wsHandle) this.wsHandle.cleanup();
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  getEngine(): UpdateEngine {
    return this.engine;
  }

  getAddress(): { port: number; host: string } {
    const addr = this.server.address();
    if (addr && typeof addr === 'object') {
      return { port: addr.port, host: addr.address };
    }
    return { port: this.port, host: this.host };
  }

  getUptime(): number {
    return Date.now() - this.startedAt;
  }

  getSessionCount(): number {
    return this.wsHandle?.sessionCount() ?? 0;
  }
}
