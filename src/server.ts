// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — Process Entry Point
// ═══════════════════════════════════════════════════════════════════════════════
//
// Load config → open storage → build service → listen. The HTTP server does
// not accept connections until the service is fully initialized.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Server } from 'node:http';
import { createApp } from './api/index.js';
import { loadConfig } from './config/index.js';
import { ShutdownCoordinator } from './infrastructure/shutdown.js';
import { getLogger } from './observability/logging/index.js';
import { createKnowledgeService } from './service.js';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const service = await createKnowledgeService(config);
  const logger = getLogger({ component: 'server' });

  const app = createApp(service);
  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Server listening', {
      host: config.server.host,
      port: config.server.port,
      environment: config.environment,
      storage: config.storage.backend,
      answerer: config.answerer.provider,
    });
  });

  const shutdown = new ShutdownCoordinator({ timeoutMs: config.server.shutdownTimeoutMs });
  shutdown.register('http-server', () => closeServer(server), 'critical');
  shutdown.register('storage', () => service.close(), 'high');
  shutdown.installSignalHandlers();
}

main().catch((error: unknown) => {
  getLogger({ component: 'server' }).fatal('Startup failed', error);
  process.exit(1);
});
