import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';

import { config } from './config/captcha';
import { createRateLimiter } from './middleware/rateLimiter';
import { ImageFormat } from './types/challenge';
import { ChallengeManager } from './utils/challengeManager';
import { isCaptchaError } from './utils/errors';
import { CONTENT_TYPES } from './utils/imageEncoder';
import { SecurityLogger } from './utils/securityLogger';

export interface CreateAppOptions {
  manager: ChallengeManager;
  imageFormat?: ImageFormat;
  allowedOrigins?: string[];
  rateLimit?: { windowMs: number; maxRequests: number };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readNumber(body: unknown, field: string): number | null {
  if (!isRecord(body)) return null;
  const value = body[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * HTTP adapter exposing the challenge operations to an out-of-process host
 */
export function createApp(options: CreateAppOptions): Express {
  const { manager } = options;
  const contentType = CONTENT_TYPES[options.imageFormat ?? config.imageFormat];
  const allowedOrigins = options.allowedOrigins ?? config.allowedOrigins;
  const limiter = createRateLimiter({
    ...(options.rateLimit ?? config.rateLimit),
    message: 'Too many captcha requests. Please try again later.',
  });

  const app = express();

  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));
  app.use(cors({
    origin: (origin, callback) => {
      // server-to-server calls from the host carry no Origin
      if (!origin) return callback(null, true);
      if (allowedOrigins.includes(origin)) return callback(null, true);
      SecurityLogger.warn('CORS blocked origin', { details: origin });
      return callback(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));
  app.use(express.json());

  // =====================================================
  // CHALLENGE ROUTES
  // =====================================================

  app.post('/captcha/:sessionId', limiter, async (req: Request, res: Response) => {
    const { sessionId } = req.params;
    const zoom = readNumber(req.body, 'zoom');

    try {
      await manager.generate(sessionId, zoom ?? Number.NaN);
      res.status(201).json({ success: true });
    } catch (error) {
      if (isCaptchaError(error) && error.code === 'INVALID_ARGUMENT') {
        return res.status(400).json({ success: false, message: error.message });
      }
      SecurityLogger.error('Error generating captcha', error, { sessionId });
      res.status(500).json({ success: false, message: 'Failed to generate challenge' });
    }
  });

  app.get('/captcha/:sessionId', limiter, (req: Request, res: Response) => {
    const image = manager.getChallenge(req.params.sessionId);
    if (!image) {
      return res.status(404).json({ success: false, message: 'Challenge not found' });
    }

    res.setHeader('Cache-Control', 'no-store');
    res.type(contentType);
    res.status(200).send(image);
  });

  app.post('/captcha/:sessionId/input', limiter, async (req: Request, res: Response) => {
    const { sessionId } = req.params;
    const symbol = readNumber(req.body, 'symbol');
    if (symbol === null) {
      return res.status(400).json({ success: false, message: 'symbol must be a number' });
    }

    try {
      const outcome = await manager.submitInput(sessionId, symbol);
      res.json({ success: true, outcome });
    } catch (error) {
      SecurityLogger.error('Error processing captcha input', error, { sessionId });
      res.status(500).json({ success: false, message: 'Failed to regenerate challenge' });
    }
  });

  app.delete('/captcha/:sessionId', limiter, (req: Request, res: Response) => {
    manager.removeChallenge(req.params.sessionId);
    res.status(204).end();
  });

  // =====================================================
  // METRICS & HEALTH
  // =====================================================

  app.get('/api/metrics', (req: Request, res: Response) => {
    res.json({
      success: true,
      timestamp: new Date().toISOString(),
      metrics: manager.metrics.snapshot(),
      solveRate: manager.metrics.getSolveRate(),
      activeChallenges: manager.size(),
    });
  });

  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy', timestamp: new Date().toISOString(), service: 'arrow-captcha' });
  });

  return app;
}
