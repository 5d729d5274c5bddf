import sharp from 'sharp';
import { EncoderOptions, ImageFormat, RasterCanvas } from '../types/challenge';
import { EncodingError } from './errors';

export const DEFAULT_ENCODER_OPTIONS: EncoderOptions = {
    format: 'png',
    quality: 80,
};

export const CONTENT_TYPES: Record<ImageFormat, string> = {
    jpeg: 'image/jpeg',
    png: 'image/png',
};

/**
 * Whether the installed sharp/libvips build can write `format` to a buffer
 */
export function canEncode(format: ImageFormat): boolean {
    const info = sharp.format[format];
    return Boolean(info && info.output.buffer);
}

/**
 * Serialize a raw RGB canvas. PNG is palette-quantized at the given quality
 * and JPEG is written at it, so both formats are lossy.
 */
export async function encodeCanvas(canvas: RasterCanvas, options: EncoderOptions = DEFAULT_ENCODER_OPTIONS): Promise<Buffer> {
    if (!canEncode(options.format)) {
        throw new EncodingError(`No ${options.format} encoder available in this sharp build`);
    }

    const pipeline = sharp(canvas.data, {
        raw: { width: canvas.width, height: canvas.height, channels: canvas.channels },
    });

    if (options.format === 'png') {
        return pipeline.png({ palette: true, quality: options.quality, compressionLevel: 9 }).toBuffer();
    }
    return pipeline.jpeg({ quality: options.quality, chromaSubsampling: '4:4:4' }).toBuffer();
}
