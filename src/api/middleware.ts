import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ValidationError, formatApiError } from '../utils/errors.js';

/**
 * Rate limiter for public endpoints
 * 100 requests per minute per IP
 */
export function createPublicRateLimiter(): RateLimitRequestHandler {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, error: 'Too many requests, please try again later' },
    keyGenerator: (req) => {
      // Use X-Forwarded-For for proxied requests, fall back to IP
      const forwarded = req.headers['x-forwarded-for'];
      if (typeof forwarded === 'string') {
        return forwarded.split(',')[0]?.trim() ?? 'unknown';
      }
      return req.ip ?? 'unknown';
    },
  });
}

/**
 * Parse `value` with `schema`, raising ValidationError on the first issue
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.');
    throw new ValidationError(
      issue ? `${field ? `${field}: ` : ''}${issue.message}` : 'Invalid request',
      field
    );
  }
  return result.data;
}

/**
 * Global error handler middleware
 */
export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  // express.json() raises SyntaxError with the raw body attached
  const error = err instanceof SyntaxError && 'body' in err ? new ValidationError('Malformed JSON body') : err;
  const { status, body } = formatApiError(error);

  if (status >= 500) {
    logger.error(
      {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
        path: req.path,
        method: req.method,
      },
      'Request error'
    );
  } else {
    logger.debug({ error: body.error, path: req.path, method: req.method }, 'Request rejected');
  }

  res.status(status).json(body);
};

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ success: false, error: 'Not found' });
}

/**
 * Request ID middleware for tracing
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : randomUUID();
  res.setHeader('X-Request-ID', requestId);
  next();
}
