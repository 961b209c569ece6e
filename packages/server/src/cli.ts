#!/usr/bin/env node

// CLI entry point for @indicator-dash/server
// Usage: npm start
// Fixed address and dataset; embedders pass their own through startServer().

import { DEFAULT_DATA_URL } from '@indicator-dash/core';
import { DEFAULT_HOST, DEFAULT_PORT, type DashboardServer } from './DashboardServer.js';
import { startServer } from './index.js';

let server: DashboardServer | null = null;

async function shutdown(code: number): Promise<void> {
  console.log('\n[Dashboard Server] Shutting down...');
  if (server) await server.stop();
  process.exit(code);
}

startServer({ port: DEFAULT_PORT, host: DEFAULT_HOST, dataSource: DEFAULT_DATA_URL })
  .then((s) => {
    server = s;
  })
  .catch((err) => {
    console.error('[Dashboard Server] Failed to start:', err);
    process.exit(1);
  });

function onSignal(): void {
  shutdown(0).catch((err) => {
    console.error('[Dashboard Server] Shutdown failed:', err);
    process.exit(1);
  });
}

// Graceful shutdown
process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);
