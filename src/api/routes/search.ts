// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH ROUTES — POST /advanced_search
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { KnowledgeService } from '../../service.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { AdvancedSearchBodySchema } from '../schemas.js';

export const DEFAULT_SNIPPET_LENGTH = 200;

export interface SearchResultResponse {
  sector: string;
  content: string;
  score: number;
}

/**
 * First `length` characters (code points, so surrogate pairs stay whole)
 * plus "..." when the text is longer.
 */
export function snippet(content: string, length: number = DEFAULT_SNIPPET_LENGTH): string {
  const chars = Array.from(content);
  return chars.length > length ? chars.slice(0, length).join('') + '...' : content;
}

export function advancedSearchHandler(
  service: Pick<KnowledgeService, 'advancedSearch'>,
  snippetLength: number = DEFAULT_SNIPPET_LENGTH
) {
  return asyncHandler(async (req: Request, res: Response) => {
    const body = AdvancedSearchBodySchema.parse(req.body ?? {});
    const results = await service.advancedSearch(body.query, body.preferences);

    const response: SearchResultResponse[] = results.map(result => ({
      sector: result.sector,
      content: snippet(result.content, snippetLength),
      score: result.score,
    }));
    res.json(response);
  });
}

export function createSearchRouter(
  service: Pick<KnowledgeService, 'advancedSearch'>,
  snippetLength?: number
): Router {
  const router = Router();
  router.post('/advanced_search', advancedSearchHandler(service, snippetLength));
  return router;
}
