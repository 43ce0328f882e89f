// ═══════════════════════════════════════════════════════════════════════════════
// HTTP APP — Express Wiring
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express } from 'express';
import type { KnowledgeService } from '../service.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestContext } from './middleware/request-context.js';
import { createContentRouter } from './routes/content.js';
import { createHealthRouter } from './routes/health.js';
import { createProgressRouter } from './routes/progress.js';
import { createSearchRouter } from './routes/search.js';

export function createApp(service: KnowledgeService): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestContext);
  app.use(express.json({ limit: '100kb' }));

  app.use(createHealthRouter(service));
  app.use(createContentRouter(service));
  app.use(createSearchRouter(service, service.config.search.snippetLength));
  app.use(createProgressRouter(service));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
