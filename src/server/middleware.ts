/**
 * Trendwire — HTTP Middleware
 *
 * Request logging, per-client rate limiting and the final error handler.
 */

import type { ErrorRequestHandler, RequestHandler } from 'express';
import { nanoid } from 'nanoid';
import { logger, errorMessage } from '../lib/logger';
import { getClientId, type RateLimiter } from '../lib/rate-limiter';

const httpLogger = logger.child({ component: 'http' });

// ============================================================
// REQUEST LOGGING
// ============================================================

/**
 * Tags each request with an id (echoed as X-Request-Id) and logs the
 * outcome once the response is sent.
 */
export const requestLogger: RequestHandler = (req, res, next) => {
  const start = Date.now();
  const requestId = nanoid(12);

  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    httpLogger.info('Request completed', {
      requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - start,
    });
  });

  next();
};

// ============================================================
// RATE LIMITING
// ============================================================

export interface RateLimitRejection {
  error: string;
  message: string;
  retryAfter: number;
}

/**
 * Admit the request through the limiter or answer 429 with the
 * X-RateLimit-* headers and retry guidance.
 */
export function rateLimit(limiter: RateLimiter): RequestHandler {
  return (req, res, next) => {
    const clientId = getClientId(req);

    if (limiter.isAllowed(clientId)) {
      next();
      return;
    }

    const resetTime = limiter.getResetTime(clientId);
    const retryAfter = limiter.getRetryAfter(clientId);

    httpLogger.warn('Rate limit exceeded', { clientId, retryAfter });

    res.set({
      'X-RateLimit-Limit': String(limiter.limit),
      'X-RateLimit-Remaining': String(limiter.getRemainingRequests(clientId)),
      'X-RateLimit-Reset': resetTime === null ? '0' : String(Math.trunc(resetTime / 1000)),
      'Retry-After': String(retryAfter),
    });

    const body: RateLimitRejection = {
      error: 'Rate limit exceeded',
      message: `Too many requests. Limit: ${limiter.limit} per ${limiter.periodSeconds} seconds`,
      retryAfter,
    };
    res.status(429).json(body);
  };
}

// ============================================================
// ERROR HANDLER
// ============================================================

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  httpLogger.error('Unhandled error', {
    requestId: res.locals.requestId,
    path: req.path,
    error: errorMessage(err),
  });

  res.status(500).json({
    error: 'Internal server error',
    message: 'An unexpected error occurred while processing your request.',
  });
};
