export { DashboardServer, DEFAULT_PORT, DEFAULT_HOST } from './DashboardServer.js';
export type { ServerConfig } from './DashboardServer.js';
export { Session } from './Session.js';

/**
 * Quick-start helper — loads the dataset, then creates and starts a server.
 * A dataset that cannot be loaded rejects before anything listens.
 *
 * @example
 * ```ts
 * import { startServer } from '@indicator-dash/server';
 * const server = await startServer({ dataSource: './data/indicators.csv', port: 8050 });
 * // GET /, GET /outputs/scatterplot?x-axis=pop, ws://127.0.0.1:8050
 * ```
 */
export async function startServer(
  config: import('./DashboardServer.js').ServerConfig & { dataSource?: string } = {},
): Promise<import('./DashboardServer.js').DashboardServer> {
  const { loadDataset } = await import('@indicator-dash/core');
  const { DashboardServer } = await import('./DashboardServer.js');
  const { dataSource, ...serverConfig } = config;
  const dataset = await loadDataset(dataSource);
  const server = new DashboardServer(dataset, serverConfig);
  await server.start();
  return server;
}
