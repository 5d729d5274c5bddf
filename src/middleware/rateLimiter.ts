import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Request, Response } from 'express';
import { RateLimitConfig } from '../types/rateLimit';
import { SecurityLogger } from '../utils/securityLogger';

const DEFAULT_MESSAGE = 'Too many requests, please try again later.';

/**
 * Per-client limiter backed by express-rate-limit's in-process store
 */
export function createRateLimiter(config: RateLimitConfig): RateLimitRequestHandler {
  const message = config.message || DEFAULT_MESSAGE;

  return rateLimit({
    windowMs: config.windowMs,
    limit: config.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request): string => req.ip || req.socket.remoteAddress || 'unknown',
    handler: (req: Request, res: Response) => {
      SecurityLogger.warn('Rate limit exceeded', { type: 'RATE_LIMIT_EXCEEDED', ip: req.ip, details: req.path });
      res.status(429).json({ success: false, message });
    },
  });
}
