import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { canEncode, CONTENT_TYPES, DEFAULT_ENCODER_OPTIONS, encodeCanvas } from '../utils/imageEncoder';
import { EncodingError } from '../utils/errors';
import { RasterCanvas } from '../types/challenge';

function solidCanvas(width: number, height: number, value: number): RasterCanvas {
  return { width, height, channels: 3, data: Buffer.alloc(width * height * 3, value) };
}

describe('encodeCanvas', () => {
  it('defaults to PNG at quality 80', () => {
    expect(DEFAULT_ENCODER_OPTIONS).toEqual({ format: 'png', quality: 80 });
    expect(CONTENT_TYPES[DEFAULT_ENCODER_OPTIONS.format]).toBe('image/png');
  });

  it('writes a JPEG of the canvas size when asked', async () => {
    const image = await encodeCanvas(solidCanvas(8, 4, 200), { format: 'jpeg', quality: 80 });
    const metadata = await sharp(image).metadata();

    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(8);
    expect(metadata.height).toBe(4);
    expect(metadata.channels).toBe(3);
  });

  it('keeps a flat colour close to its source value', async () => {
    const image = await encodeCanvas(solidCanvas(16, 16, 120), { format: 'jpeg', quality: 80 });
    const { data } = await sharp(image).raw().toBuffer({ resolveWithObject: true });

    expect(Math.abs(data[0] - 120)).toBeLessThanOrEqual(3);
  });

  it('writes a PNG by default', async () => {
    const image = await encodeCanvas(solidCanvas(5, 3, 10));
    const metadata = await sharp(image).metadata();

    expect(metadata.format).toBe('png');
    expect(metadata.width).toBe(5);
    expect(metadata.height).toBe(3);
  });

  it('fails with EncodingError when the build cannot write the format', async () => {
    const output = sharp.format.png.output;
    const original = output.buffer;
    output.buffer = false;
    try {
      expect(canEncode('png')).toBe(false);
      expect(canEncode('jpeg')).toBe(true);
      await expect(encodeCanvas(solidCanvas(2, 2, 0))).rejects.toThrow(EncodingError);
    } finally {
      output.buffer = original;
    }
    expect(canEncode('png')).toBe(true);
  });
});
