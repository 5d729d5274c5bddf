import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';
import { createApp } from '../server';
import { ChallengeManager } from '../utils/challengeManager';
import { ArrowSymbol } from '../types/challenge';
import { stubSynthesizer } from './helpers';

const CORRECT: ArrowSymbol[] = [1, 0, 2, 1, 0, 2];

function buildApp(overrides: { maxRequests?: number; failing?: boolean } = {}) {
  const manager = new ChallengeManager({
    maxFailures: 1,
    synthesize: overrides.failing
      ? async () => {
          throw new Error('renderer unavailable');
        }
      : stubSynthesizer([CORRECT]).synthesize,
  });
  const app = createApp({
    manager,
    imageFormat: 'png',
    allowedOrigins: ['http://localhost:3000'],
    rateLimit: { windowMs: 60_000, maxRequests: overrides.maxRequests ?? 100 },
  });
  return { app, manager };
}

describe('captcha HTTP routes', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates a challenge and serves its image', async () => {
    const { app, manager } = buildApp();

    const created = await request(app).post('/captcha/player-1').send({ zoom: 2 });
    expect(created.status).toBe(201);
    expect(created.body).toEqual({ success: true });
    expect(manager.contains('player-1')).toBe(true);

    const image = await request(app).get('/captcha/player-1');
    expect(image.status).toBe(200);
    expect(image.headers['content-type']).toBe('image/png');
    expect(image.headers['cache-control']).toBe('no-store');
    expect(Buffer.isBuffer(image.body)).toBe(true);
    expect(image.body.toString()).toBe('image-1');
  });

  it('rejects an out-of-range or missing zoom', async () => {
    const { app, manager } = buildApp();

    const outOfRange = await request(app).post('/captcha/p').send({ zoom: 5 });
    expect(outOfRange.status).toBe(400);
    expect(outOfRange.body.success).toBe(false);

    const missing = await request(app).post('/captcha/p').send({});
    expect(missing.status).toBe(400);
    expect(manager.contains('p')).toBe(false);
  });

  it('answers 404 for an unknown challenge', async () => {
    const { app } = buildApp();
    const res = await request(app).get('/captcha/nobody');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, message: 'Challenge not found' });
  });

  it('reports input outcomes through to solved', async () => {
    const { app, manager } = buildApp();
    await request(app).post('/captcha/p').send({ zoom: 1 });

    for (const symbol of CORRECT.slice(0, 5)) {
      const res = await request(app).post('/captcha/p/input').send({ symbol });
      expect(res.body).toEqual({ success: true, outcome: 'pending' });
    }
    const last = await request(app).post('/captcha/p/input').send({ symbol: CORRECT[5] });
    expect(last.body).toEqual({ success: true, outcome: 'solved' });
    expect(manager.contains('p')).toBe(false);

    const after = await request(app).post('/captcha/p/input').send({ symbol: 0 });
    expect(after.body).toEqual({ success: true, outcome: 'absent' });
  });

  it('regenerates after the failure limit', async () => {
    const { app } = buildApp();
    await request(app).post('/captcha/p').send({ zoom: 1 });

    for (let i = 0; i < 5; i++) {
      await request(app).post('/captcha/p/input').send({ symbol: 2 });
    }
    const res = await request(app).post('/captcha/p/input').send({ symbol: 2 });
    expect(res.body).toEqual({ success: true, outcome: 'regenerated' });

    const image = await request(app).get('/captcha/p');
    expect(image.body.toString()).toBe('image-2');
  });

  it('requires a numeric symbol', async () => {
    const { app } = buildApp();
    const res = await request(app).post('/captcha/p/input').send({ symbol: 'left' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, message: 'symbol must be a number' });
  });

  it('removes a challenge', async () => {
    const { app, manager } = buildApp();
    await request(app).post('/captcha/p').send({ zoom: 3 });

    const res = await request(app).delete('/captcha/p');
    expect(res.status).toBe(204);
    expect(manager.contains('p')).toBe(false);
    expect(manager.metrics.snapshot().challengesRemoved).toBe(1);
  });

  it('answers 500 when synthesis fails', async () => {
    const { app, manager } = buildApp({ failing: true });
    const res = await request(app).post('/captcha/p').send({ zoom: 2 });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ success: false, message: 'Failed to generate challenge' });
    expect(manager.metrics.snapshot().generationFailures).toBe(1);
  });

  it('rate limits the challenge routes', async () => {
    const { app } = buildApp({ maxRequests: 2 });

    const first = await request(app).get('/captcha/a');
    expect(first.status).toBe(404);
    expect(first.headers['ratelimit-limit']).toBe('2');
    expect(first.headers['ratelimit-remaining']).toBe('1');
    expect(first.headers['x-ratelimit-limit']).toBeUndefined();
    expect((await request(app).get('/captcha/a')).status).toBe(404);
    const limited = await request(app).get('/captcha/a');
    expect(limited.status).toBe(429);
    expect(limited.body).toEqual({ success: false, message: 'Too many captcha requests. Please try again later.' });
  });

  it('exposes metrics and health', async () => {
    const { app } = buildApp();
    await request(app).post('/captcha/p').send({ zoom: 4 });

    const metrics = await request(app).get('/api/metrics');
    expect(metrics.status).toBe(200);
    expect(metrics.body.metrics.challengesIssued).toBe(1);
    expect(metrics.body.metrics.issuedByZoom).toEqual({ '1': 0, '2': 0, '3': 0, '4': 1 });
    expect(metrics.body.solveRate).toBe(0);
    expect(metrics.body.activeChallenges).toBe(1);

    const health = await request(app).get('/health');
    expect(health.body.status).toBe('healthy');
    expect(health.body.service).toBe('arrow-captcha');
  });
});
