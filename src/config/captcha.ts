/**
 * Captcha Configuration
 * Read once from the environment; invalid values fall back to defaults
 */

import { ImageFormat } from '../types/challenge';

export interface CaptchaConfig {
    environment: string;
    port: number;
    maxFailures: number;
    imageFormat: ImageFormat;
    imageQuality: number;
    idleTimeoutMs: number;
    sweepIntervalMs: number;
    rateLimit: {
        windowMs: number;
        maxRequests: number;
    };
    allowedOrigins: string[];
}

export const DEFAULT_MAX_FAILURES = 10;

function readInt(raw: string | undefined, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) return fallback;
    return parsed;
}

function readFormat(raw: string | undefined): ImageFormat {
    const value = raw?.trim().toLowerCase();
    if (value === 'jpg' || value === 'jpeg') return 'jpeg';
    return 'png';
}

function readList(raw: string | undefined): string[] {
    if (!raw) return ['http://localhost:3000'];
    return raw.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CaptchaConfig {
    return {
        environment: env.NODE_ENV || 'development',
        port: readInt(env.PORT, 3002, 1, 65535),
        maxFailures: readInt(env.CAPTCHA_MAX_FAILURES, DEFAULT_MAX_FAILURES, 1),
        imageFormat: readFormat(env.CAPTCHA_IMAGE_FORMAT),
        imageQuality: readInt(env.CAPTCHA_IMAGE_QUALITY, 80, 1, 100),
        idleTimeoutMs: readInt(env.CAPTCHA_IDLE_TIMEOUT_MS, 0, 0),
        sweepIntervalMs: readInt(env.CAPTCHA_SWEEP_INTERVAL_MS, 60 * 1000, 1),
        rateLimit: {
            windowMs: readInt(env.CAPTCHA_RATE_LIMIT_WINDOW_MS, 60 * 1000, 1),
            maxRequests: readInt(env.CAPTCHA_RATE_LIMIT_MAX, 120, 1),
        },
        allowedOrigins: readList(env.CAPTCHA_ALLOWED_ORIGINS),
    };
}

export const config = loadConfig();
