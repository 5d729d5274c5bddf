import { ArrowSymbol, RenderedChallenge, Zoom } from '../types/challenge';
import { Synthesizer } from '../utils/challengeManager';

export interface StubSynthesizer {
  synthesize: Synthesizer;
  calls: Zoom[];
}

/**
 * Renders nothing: hands out the given answers in order (repeating the last)
 * with images "image-1", "image-2", ...
 */
export function stubSynthesizer(sequences: ArrowSymbol[][]): StubSynthesizer {
  const calls: Zoom[] = [];
  const synthesize: Synthesizer = async (zoom) => {
    calls.push(zoom);
    const sequence = sequences[Math.min(calls.length - 1, sequences.length - 1)];
    return stubRender(sequence, zoom, `image-${calls.length}`);
  };
  return { synthesize, calls };
}

export function stubRender(sequence: ArrowSymbol[], zoom: Zoom, label: string): RenderedChallenge {
  return { sequence, image: Buffer.from(label), zoom, width: 180 * zoom, height: 35 * zoom };
}
