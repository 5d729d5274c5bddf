export type CaptchaErrorCode =
  | 'INVALID_ARGUMENT'
  | 'DISPOSED'
  | 'ENCODING_ERROR'
  | 'GENERATION_FAILED';

export class CaptchaError extends Error {
  readonly code: CaptchaErrorCode;

  constructor(code: CaptchaErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CaptchaError';
    this.code = code;
  }
}

/**
 * Zoom or symbol outside the accepted range. No state was changed.
 */
export class InvalidArgumentError extends CaptchaError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

export class DisposedError extends CaptchaError {
  constructor(message = 'Challenge session has been disposed') {
    super('DISPOSED', message);
    this.name = 'DisposedError';
  }
}

/**
 * The sharp build in this runtime cannot write the configured format.
 * Configuration-level, never retried.
 */
export class EncodingError extends CaptchaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ENCODING_ERROR', message, options);
    this.name = 'EncodingError';
  }
}

export class GenerationFailedError extends CaptchaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILED', message, options);
    this.name = 'GenerationFailedError';
  }
}

export function isCaptchaError(value: unknown): value is CaptchaError {
  return value instanceof CaptchaError;
}
