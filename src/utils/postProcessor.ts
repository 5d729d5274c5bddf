import { RasterCanvas, Zoom } from '../types/challenge';

function cloneCanvas(canvas: RasterCanvas): RasterCanvas {
    return { ...canvas, data: Buffer.from(canvas.data) };
}

/**
 * Scale-dependent degradation: pixelation above zoom 1, blur above zoom 2.
 * Always returns a new canvas.
 */
export function applyImageEffects(canvas: RasterCanvas, zoom: Zoom): RasterCanvas {
    if (zoom === 1) return cloneCanvas(canvas);

    let result = pixelate(canvas, Math.max(1, Math.floor(zoom / 4)));
    if (zoom > 2) {
        const strength = 0.3 + zoom * 0.1;
        result = boxBlur(result, Math.max(1, Math.floor(zoom / 6)), strength);
    }
    return result;
}

/**
 * Fill every blockSize x blockSize block with the colour of its top-left pixel
 */
export function pixelate(canvas: RasterCanvas, blockSize: number): RasterCanvas {
    const out = cloneCanvas(canvas);
    if (blockSize <= 1) return out;

    const { width, height, channels, data } = canvas;
    for (let by = 0; by < height; by += blockSize) {
        for (let bx = 0; bx < width; bx += blockSize) {
            const src = (by * width + bx) * channels;
            const yEnd = Math.min(by + blockSize, height);
            const xEnd = Math.min(bx + blockSize, width);
            for (let y = by; y < yEnd; y++) {
                for (let x = bx; x < xEnd; x++) {
                    const dst = (y * width + x) * channels;
                    out.data[dst] = data[src];
                    out.data[dst + 1] = data[src + 1];
                    out.data[dst + 2] = data[src + 2];
                }
            }
        }
    }
    return out;
}

/**
 * Uniform kernelSize x kernelSize convolution whose weights sum to `strength`.
 * Pixels whose window would leave the canvas keep their value; a 1x1 kernel
 * is treated as the identity.
 */
export function boxBlur(canvas: RasterCanvas, kernelSize: number, strength: number): RasterCanvas {
    const out = cloneCanvas(canvas);
    if (kernelSize <= 1) return out;

    const { width, height, channels, data } = canvas;
    const origin = Math.floor((kernelSize - 1) / 2);
    const weight = strength / (kernelSize * kernelSize);

    for (let y = origin; y + kernelSize - origin <= height; y++) {
        for (let x = origin; x + kernelSize - origin <= width; x++) {
            for (let c = 0; c < channels; c++) {
                let sum = 0;
                for (let ky = 0; ky < kernelSize; ky++) {
                    const row = (y - origin + ky) * width;
                    for (let kx = 0; kx < kernelSize; kx++) {
                        sum += data[(row + x - origin + kx) * channels + c];
                    }
                }
                out.data[(y * width + x) * channels + c] = Math.min(255, Math.max(0, Math.round(sum * weight)));
            }
        }
    }
    return out;
}
