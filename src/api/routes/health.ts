// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — GET /health
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { KnowledgeService } from '../../service.js';
import { asyncHandler } from '../middleware/error-handler.js';

const startedAt = Date.now();

/**
 * 200 while storage answers, 503 otherwise.
 */
export function healthHandler(service: Pick<KnowledgeService, 'health'>) {
  return asyncHandler(async (_req: Request, res: Response) => {
    const health = await service.health();
    res.status(health.status === 'ok' ? 200 : 503).json({
      ...health,
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      timestamp: new Date().toISOString(),
    });
  });
}

export function createHealthRouter(service: Pick<KnowledgeService, 'health'>): Router {
  const router = Router();
  router.get('/health', healthHandler(service));
  return router;
}
