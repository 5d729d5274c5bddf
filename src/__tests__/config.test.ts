import { describe, expect, it } from 'vitest';
import { DEFAULT_MAX_FAILURES, loadConfig } from '../config/captcha';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      environment: 'development',
      port: 3002,
      maxFailures: DEFAULT_MAX_FAILURES,
      imageFormat: 'png',
      imageQuality: 80,
      idleTimeoutMs: 0,
      sweepIntervalMs: 60000,
      rateLimit: { windowMs: 60000, maxRequests: 120 },
      allowedOrigins: ['http://localhost:3000'],
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      CAPTCHA_MAX_FAILURES: '3',
      CAPTCHA_IMAGE_FORMAT: 'JPG',
      CAPTCHA_IMAGE_QUALITY: '95',
      CAPTCHA_IDLE_TIMEOUT_MS: '300000',
      CAPTCHA_RATE_LIMIT_MAX: '10',
      CAPTCHA_ALLOWED_ORIGINS: 'https://a.example, https://b.example,',
    });

    expect(config.environment).toBe('production');
    expect(config.port).toBe(8080);
    expect(config.maxFailures).toBe(3);
    expect(config.imageFormat).toBe('jpeg');
    expect(config.imageQuality).toBe(95);
    expect(config.idleTimeoutMs).toBe(300000);
    expect(config.rateLimit.maxRequests).toBe(10);
    expect(config.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
  });

  it('falls back on invalid values', () => {
    const config = loadConfig({
      PORT: '70000',
      CAPTCHA_MAX_FAILURES: '0',
      CAPTCHA_IMAGE_FORMAT: 'gif',
      CAPTCHA_IMAGE_QUALITY: '8.5',
      CAPTCHA_SWEEP_INTERVAL_MS: 'soon',
    });

    expect(config.port).toBe(3002);
    expect(config.maxFailures).toBe(10);
    expect(config.imageFormat).toBe('png');
    expect(config.imageQuality).toBe(80);
    expect(config.sweepIntervalMs).toBe(60000);
  });
});
