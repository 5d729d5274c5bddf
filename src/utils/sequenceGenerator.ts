import { ArrowSymbol } from '../types/challenge';
import { cryptoRng, pickIndex, Rng } from './random';

export const SEQUENCE_LENGTH = 6;

export const ARROW_SYMBOLS: readonly ArrowSymbol[] = [0, 1, 2];

export function isArrowSymbol(value: unknown): value is ArrowSymbol {
  return value === 0 || value === 1 || value === 2;
}

/**
 * Draw a fresh answer: six independent uniform picks over {0, 1, 2}.
 * 729 possible answers; guessing resistance is left to the host.
 */
export function generateSequence(rng: Rng = cryptoRng): ArrowSymbol[] {
  const sequence: ArrowSymbol[] = [];
  for (let i = 0; i < SEQUENCE_LENGTH; i++) {
    sequence.push(ARROW_SYMBOLS[pickIndex(ARROW_SYMBOLS.length, rng)]);
  }
  return sequence;
}

export function sequenceToString(sequence: readonly ArrowSymbol[]): string {
  return sequence.join('');
}
