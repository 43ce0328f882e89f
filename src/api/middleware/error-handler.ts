// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Error Classes and Central Express Middleware
// ═══════════════════════════════════════════════════════════════════════════════

import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { getRequestId, loggers } from '../../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  /** false for faults the client cannot act on; their message is not sent */
  readonly isOperational: boolean = true;

  constructor(
    message: string,
    readonly statusCode: number = 400,
    readonly code: string = 'BAD_REQUEST',
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class InternalError extends ApiError {
  override readonly isOperational = false;

  constructor(message: string) {
    super(message, 500, 'INTERNAL_ERROR');
    this.name = 'InternalError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE SHAPE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorResponseBody {
  error: string;
  code: string;
  details?: Record<string, unknown>;
  requestId?: string;
  timestamp: string;
}

const GENERIC_MESSAGE = 'An unexpected error occurred';

function zodDetails(error: ZodError): Record<string, unknown> {
  const flattened = error.flatten();
  return {
    fields: flattened.fieldErrors,
    ...(flattened.formErrors.length > 0 ? { form: flattened.formErrors } : {}),
  };
}

/**
 * body-parser marks malformed JSON with a `body` property on a SyntaxError.
 */
function isJsonParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) return error;
  if (error instanceof ZodError) {
    return new ValidationError('Invalid request body', zodDetails(error));
  }
  if (isJsonParseError(error)) {
    return new ApiError('Invalid JSON in request body', 400, 'INVALID_JSON');
  }
  return new InternalError(error instanceof Error ? error.message : String(error));
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const apiError = toApiError(error);
  const logger = loggers.http;

  if (apiError.isOperational) {
    logger.debug('Request rejected', { path: req.path, code: apiError.code, status: apiError.statusCode });
  } else {
    logger.error('Unhandled error', error, { path: req.path, method: req.method });
  }

  const requestId = getRequestId();
  const body: ErrorResponseBody = {
    error: apiError.isOperational ? apiError.message : GENERIC_MESSAGE,
    code: apiError.code,
    ...(apiError.isOperational && apiError.details ? { details: apiError.details } : {}),
    ...(requestId ? { requestId } : {}),
    timestamp: new Date().toISOString(),
  };

  res.status(apiError.statusCode).json(body);
}

/**
 * Unknown routes. Mount after every router.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

/**
 * Forward a rejected handler promise to the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): (req: Request, res: Response, next: NextFunction) => Promise<void> {
  return async (req, res, next) => {
    try {
      await fn(req, res, next);
    } catch (error) {
      next(error);
    }
  };
}
