import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { FeedError, userMessageFor } from '../errors';
import { debugLogger } from '../utils/debug-logger';

/**
 * Security headers middleware using helmet. The API serves JSON and image
 * bytes only, so the content security policy denies everything else.
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      imgSrc: ["'self'", 'data:'],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'cross-origin' },
  dnsPrefetchControl: { allow: false },
  frameguard: { action: 'deny' },
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
});

// In production the feed is served same-origin; in development allow a local frontend
export function createCorsMiddleware(frontendUrl: string | undefined, nodeEnv: string): RequestHandler {
  return cors({
    origin: frontendUrl || (nodeEnv === 'production' ? true : 'http://localhost:5173'),
    credentials: true,
  });
}

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

export function createRateLimiter(options: RateLimitOptions = { windowMs: 60 * 1000, max: 60 }): RequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    message: { error: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Forward rejections of async handlers to the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

function statusForFeedError(error: FeedError): number {
  switch (error.kind) {
    case 'not_found':
      return 404;
    case 'client':
    case 'decoding':
      return 400;
    case 'rate_limited':
      return 429;
    case 'timeout':
      return 504;
    case 'transport':
    case 'server':
      return 502;
    default:
      return 500;
  }
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Invalid request',
      details: err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    });
    return;
  }

  // express.json() rejects unparseable bodies with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }

  if (err instanceof FeedError) {
    debugLogger.stepError(null, 'API', `Request failed (${err.kind})`, err);
    res.status(statusForFeedError(err)).json({ error: userMessageFor(err), kind: err.kind });
    return;
  }

  console.error('Error:', err);

  res.status(500).json({
    error: 'Internal server error',
    message: process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : undefined,
  });
}

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(`${req.method} ${req.path} - ${res.statusCode} - ${duration}ms`);
  });

  next();
}
