export * from './types/challenge';
export { ChallengeManager } from './utils/challengeManager';
export type { ChallengeManagerOptions, Synthesizer } from './utils/challengeManager';
export { ChallengeSession } from './utils/challengeSession';
export { SessionStore } from './utils/sessionStore';
export { ArrowCaptchaGenerator, canvasSize, isZoom } from './utils/arrowCaptcha';
export { applyImageEffects, pixelate, boxBlur } from './utils/postProcessor';
export { encodeCanvas, canEncode } from './utils/imageEncoder';
export { generateSequence } from './utils/sequenceGenerator';
export { cryptoRng, seededRng } from './utils/random';
export type { Rng } from './utils/random';
export {
    CaptchaError,
    InvalidArgumentError,
    DisposedError,
    EncodingError,
    GenerationFailedError,
} from './utils/errors';
export { MetricsService } from './utils/metricsService';
export type { CaptchaMetrics } from './utils/metricsService';
export { CaptchaGate } from './security/captchaGate';
export type { CaptchaHost, CaptchaPlayer } from './security/captchaGate';
export { IdleSweeper } from './security/idleSweeper';
export { createApp } from './server';
export { loadConfig } from './config/captcha';
