/**
 * Arrow symbols: 0 = left, 1 = up, 2 = right
 */
export type ArrowSymbol = 0 | 1 | 2;

export type Zoom = 1 | 2 | 3 | 4;

/**
 * Opaque host-supplied identifier; compared by value only
 */
export type SessionId = string | number;

export type ChallengeOutcome = 'pending' | 'solved' | 'regenerated' | 'absent';

export type ImageFormat = 'jpeg' | 'png';

/**
 * Packed 24-bit RGB pixels, row-major, no alpha
 */
export interface RasterCanvas {
  width: number;
  height: number;
  channels: 3;
  data: Buffer;
}

export interface RenderedChallenge {
  sequence: ArrowSymbol[];
  image: Buffer;
  zoom: Zoom;
  width: number;
  height: number;
}

export interface EncoderOptions {
  format: ImageFormat;
  quality: number;
}
