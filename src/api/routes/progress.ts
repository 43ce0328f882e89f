// ═══════════════════════════════════════════════════════════════════════════════
// PROGRESS ROUTES — Study Progress Records
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { KnowledgeService } from '../../service.js';
import type { UserProgress } from '../../topics/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { ProgressBodySchema, SectorSchema } from '../schemas.js';

type ProgressApi = Pick<KnowledgeService, 'recordProgress' | 'listProgress'>;

export interface ProgressResponse {
  id: string;
  sector: string;
  last_study_date: string;
  performance: number;
  notes: string;
}

function toResponse(progress: UserProgress): ProgressResponse {
  return {
    id: progress.id,
    sector: progress.sector,
    last_study_date: progress.lastStudyDate.toISOString(),
    performance: progress.performance,
    notes: progress.notes,
  };
}

/**
 * POST /progress
 */
export function recordProgressHandler(service: ProgressApi) {
  return asyncHandler(async (req: Request, res: Response) => {
    const body = ProgressBodySchema.parse(req.body ?? {});

    const progress = await service.recordProgress({
      sector: body.sector,
      performance: body.performance,
      notes: body.notes,
      lastStudyDate: body.last_study_date ? new Date(body.last_study_date) : undefined,
    });

    res.status(201).json(toResponse(progress));
  });
}

/**
 * GET /progress/:sector
 */
export function listProgressHandler(service: ProgressApi) {
  return asyncHandler(async (req: Request, res: Response) => {
    const sector = SectorSchema.parse(req.params.sector);
    const records = await service.listProgress(sector);
    res.json(records.map(toResponse));
  });
}

export function createProgressRouter(service: ProgressApi): Router {
  const router = Router();
  router.post('/progress', recordProgressHandler(service));
  router.get('/progress/:sector', listProgressHandler(service));
  return router;
}
