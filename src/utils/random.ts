import crypto from 'crypto';

/**
 * Source of floats in [0, 1)
 */
export type Rng = () => number;

const UINT32_RANGE = 0x100000000;

/**
 * Production source backed by the OS CSPRNG
 */
export const cryptoRng: Rng = () => crypto.randomBytes(4).readUInt32BE(0) / UINT32_RANGE;

/**
 * Deterministic mulberry32 generator for reproducible renders in tests
 */
export function seededRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  };
}

function toRandomUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 0.999999999;
  return value;
}

export function pickIndex(maxExclusive: number, rng: Rng): number {
  return Math.floor(toRandomUnit(rng()) * maxExclusive);
}

/**
 * Uniform integer in [min, maxExclusive)
 */
export function randomInRange(min: number, maxExclusive: number, rng: Rng): number {
  return min + pickIndex(maxExclusive - min, rng);
}

export function pickOne<T>(items: readonly T[], rng: Rng): T {
  return items[pickIndex(items.length, rng)];
}
