import { createServer } from 'http';
import { getRequestListener } from '@hono/node-server';
import { createApp } from './app';
import { loadConfig, type Config } from './config';
import { SyncCoordinator } from './sync/coordinator';
import { SyncWebSocketServer } from './websocket/server';
import { MemoryStorage } from './storage/memory';
import { PostgresStorage } from './storage/postgres';
import type { StorageAdapter } from './storage/interface';

/**
 * pagesync server
 *
 * HTTP (hono) and the WebSocket channel share one Node HTTP server.
 */

function createStorage(config: Config): StorageAdapter {
  if (config.storageDriver === 'postgres' && config.databaseUrl) {
    return new PostgresStorage({
      connectionString: config.databaseUrl,
      poolMax: config.databasePoolMax,
    });
  }
  return new MemoryStorage();
}

const config = loadConfig();
const coordinator = new SyncCoordinator({ storage: createStorage(config) });
const wsServer = new SyncWebSocketServer(coordinator, {
  maxConnections: config.wsMaxConnections,
  heartbeatInterval: config.wsHeartbeatInterval,
  queueLimit: config.wsOutboundQueueLimit,
  highWaterMark: config.wsHighWaterMark,
});
const app = createApp(coordinator, { stats: () => wsServer.getStats() });

const server = createServer(getRequestListener(app.fetch));
wsServer.attach(server);

server.listen(config.port, config.host, () => {
  console.log(`[Server] pagesync running on ${config.host}:${config.port}`);
  console.log(`[Server] Health check: http://${config.host}:${config.port}/health`);
  console.log(`[Server] Storage: ${config.storageDriver}, environment: ${config.nodeEnv}`);
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  console.log(`[Server] ${signal} received, shutting down gracefully...`);
  await wsServer.close();
  await coordinator.dispose();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error('[Server] Shutdown failed:', error);
      process.exit(1);
    });
  });
}

export { app, server, wsServer, coordinator };
