// ═══════════════════════════════════════════════════════════════════════════════
// CONTENT ROUTES — POST /get_topic_content
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { KnowledgeService } from '../../service.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { TopicContentBodySchema } from '../schemas.js';

export interface TopicContentResponse {
  answer: string;
  link: string | null;
}

export function getTopicContentHandler(service: Pick<KnowledgeService, 'getTopicContent'>) {
  return asyncHandler(async (req: Request, res: Response) => {
    const body = TopicContentBodySchema.parse(req.body ?? {});

    const resolution = await service.getTopicContent({
      question: body.question,
      sector: body.sector,
      offlineMode: body.offline_mode,
    });

    const response: TopicContentResponse = { answer: resolution.answer, link: resolution.link };
    res.json(response);
  });
}

export function createContentRouter(service: Pick<KnowledgeService, 'getTopicContent'>): Router {
  const router = Router();
  router.post('/get_topic_content', getTopicContentHandler(service));
  return router;
}
