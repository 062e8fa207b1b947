// =============================================================================
// TRACKWELL — Request Plumbing Middleware
//
// Covers:
//   - Request IDs for tracing
//   - Request logging (method, path, status, duration; slow-request warning)
//   - 404 and error handling (no stack traces in production)
// =============================================================================

import { randomBytes } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';

const SLOW_REQUEST_MS = 1000;

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || `trk-${Date.now()}-${randomBytes(3).toString('hex')}`;
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Request Logging ────────────────────────────────────────────────────

export function requestLogger(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    console.log(`[HTTP] → ${req.method} ${req.originalUrl}`);

    res.on('finish', () => {
      const duration = Date.now() - startedAt;
      const marker = res.statusCode >= 400 ? '✗' : '✓';
      console.log(`[HTTP] ← ${marker} ${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`);
      if (duration > SLOW_REQUEST_MS) {
        console.warn(`[HTTP] Slow request: ${req.method} ${req.originalUrl} took ${duration}ms`);
      }
    });

    next();
  };
}

// ── 404 / Error Handler ────────────────────────────────────────────────

export function notFound(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  };
}

/**
 * Global error handler. Never leaks stack traces in production.
 * Malformed JSON bodies from express.json() surface here as 400s.
 */
export function errorHandler(nodeEnv: string) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    const isProd = nodeEnv === 'production';
    console.error(`[ERROR] ${err.message}`, isProd ? '' : err.stack);

    res.status(500).json({
      error: isProd ? 'Internal server error' : err.message,
      ...(isProd ? {} : { stack: err.stack }),
    });
  };
}
