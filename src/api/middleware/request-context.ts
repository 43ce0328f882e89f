// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST CONTEXT — Request Id Correlation and Access Logging
// ═══════════════════════════════════════════════════════════════════════════════

import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logRequest, runWithLoggingContext } from '../../observability/logging/index.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Reuse a caller-supplied request id, else mint one. Every log line written
 * while handling the request carries it.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get(REQUEST_ID_HEADER);
  const requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();
  const startedAt = Date.now();

  res.setHeader(REQUEST_ID_HEADER, requestId);
  res.on('finish', () => {
    logRequest({
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      duration: Date.now() - startedAt,
      requestId,
      userAgent: req.get('user-agent'),
      ip: req.ip,
    });
  });

  runWithLoggingContext({ requestId }, () => next());
}
