import sharp from 'sharp';
import { ArrowSymbol, EncoderOptions, RasterCanvas, RenderedChallenge, Zoom } from '../types/challenge';
import { InvalidArgumentError } from './errors';
import { DEFAULT_ENCODER_OPTIONS, encodeCanvas } from './imageEncoder';
import { applyImageEffects } from './postProcessor';
import { cryptoRng, pickIndex, pickOne, randomInRange, Rng } from './random';
import { generateSequence, SEQUENCE_LENGTH } from './sequenceGenerator';

export const BASE_WIDTH = 180;
export const BASE_HEIGHT = 35;
const ARROW_SIZE = 16;
const BADGE_SIZE = 24;
const BADGE_SPACING = 2;

export interface Rgb {
    r: number;
    g: number;
    b: number;
}

const BACKGROUND: Rgb = { r: 250, g: 250, b: 250 };
const LIGHT_GRAY: Rgb = { r: 192, g: 192, b: 192 };

const ARROW_COLORS: readonly Rgb[] = [
    { r: 255, g: 0, b: 0 },
    { r: 0, g: 0, b: 255 },
    { r: 0, g: 255, b: 0 },
    { r: 255, g: 0, b: 255 },
    { r: 0, g: 255, b: 255 },
    { r: 255, g: 200, b: 0 },
    { r: 255, g: 105, b: 180 },
    { r: 128, g: 0, b: 128 },
    { r: 255, g: 165, b: 0 },
];

const LINE_COLORS: readonly Rgb[] = [
    { r: 255, g: 0, b: 0 },
    { r: 0, g: 0, b: 0 },
    { r: 255, g: 255, b: 255 },
    { r: 0, g: 0, b: 255 },
    { r: 0, g: 255, b: 0 },
    { r: 128, g: 0, b: 128 },
    { r: 255, g: 165, b: 0 },
];

const NOISE_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789!@#$%^&*()';

export type NoiseLineKind = 'horizontal' | 'vertical' | 'diagonal-down' | 'diagonal-up';
const LINE_KINDS: readonly NoiseLineKind[] = ['horizontal', 'vertical', 'diagonal-down', 'diagonal-up'];

export function isZoom(value: unknown): value is Zoom {
    return value === 1 || value === 2 || value === 3 || value === 4;
}

export function assertZoom(value: unknown): asserts value is Zoom {
    if (!isZoom(value)) {
        throw new InvalidArgumentError(`Zoom level must be an integer between 1 and 4, got ${String(value)}`);
    }
}

export function canvasSize(zoom: Zoom): { width: number; height: number } {
    return { width: BASE_WIDTH * zoom, height: BASE_HEIGHT * zoom };
}

export function rgb(color: Rgb): string {
    return `rgb(${color.r},${color.g},${color.b})`;
}

/**
 * Lighten a colour by dividing each channel by 0.7; dark channels are first
 * lifted to 3 so that black still brightens.
 */
export function brighter(color: Rgb): Rgb {
    const floor = 3;
    if (color.r === 0 && color.g === 0 && color.b === 0) {
        return { r: floor, g: floor, b: floor };
    }
    const lift = (channel: number) => {
        const lifted = channel > 0 && channel < floor ? floor : channel;
        return Math.min(Math.floor(lifted / 0.7), 255);
    };
    return { r: lift(color.r), g: lift(color.g), b: lift(color.b) };
}

function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

function randomGray(min: number, maxExclusive: number, rng: Rng): Rgb {
    return {
        r: randomInRange(min, maxExclusive, rng),
        g: randomInRange(min, maxExclusive, rng),
        b: randomInRange(min, maxExclusive, rng),
    };
}

function randomColor(rng: Rng): Rgb {
    return { r: pickIndex(256, rng), g: pickIndex(256, rng), b: pickIndex(256, rng) };
}

/**
 * Seven-point arrow polygon around a badge centre
 */
export function arrowPolygon(cx: number, cy: number, symbol: ArrowSymbol, zoom: Zoom): Array<[number, number]> {
    const s = ARROW_SIZE * zoom;
    const half = Math.floor(s / 2);
    const quarter = Math.floor(s / 4);
    const third = Math.floor(s / 3);
    const sixth = Math.floor(s / 6);

    switch (symbol) {
        case 1:
            return [
                [cx, cy - third],
                [cx - half, cy + sixth],
                [cx - quarter, cy + sixth],
                [cx - quarter, cy + third],
                [cx + quarter, cy + third],
                [cx + quarter, cy + sixth],
                [cx + half, cy + sixth],
            ];
        case 0:
            return [
                [cx - third, cy],
                [cx + sixth, cy - half],
                [cx + sixth, cy - quarter],
                [cx + third, cy - quarter],
                [cx + third, cy + quarter],
                [cx + sixth, cy + quarter],
                [cx + sixth, cy + half],
            ];
        case 2:
            return [
                [cx + third, cy],
                [cx - sixth, cy - half],
                [cx - sixth, cy - quarter],
                [cx - third, cy - quarter],
                [cx - third, cy + quarter],
                [cx - sixth, cy + quarter],
                [cx - sixth, cy + half],
            ];
    }
}

/**
 * Horizontal centres of the six badges, laid out as one centred group
 */
export function badgeCenters(zoom: Zoom): number[] {
    const { width } = canvasSize(zoom);
    const size = BADGE_SIZE * zoom;
    const spacing = BADGE_SPACING * zoom;
    const total = SEQUENCE_LENGTH * size + (SEQUENCE_LENGTH - 1) * spacing;
    const startX = Math.floor((width - total) / 2) + Math.floor(size / 2);

    const centers: number[] = [];
    for (let i = 0; i < SEQUENCE_LENGTH; i++) {
        centers.push(startX + i * (size + spacing));
    }
    return centers;
}

function glyphWidth(char: string, fontSize: number): number {
    if (/[A-Z]/.test(char)) return fontSize * 0.72;
    if (/[0-9]/.test(char)) return fontSize * 0.56;
    if (/[a-z]/.test(char)) return fontSize * 0.56;
    return fontSize * 0.5;
}

export class ArrowCaptchaGenerator {
    private readonly encoder: EncoderOptions;

    constructor(encoder: Partial<EncoderOptions> = {}) {
        this.encoder = { ...DEFAULT_ENCODER_OPTIONS, ...encoder };
    }

    /**
     * Draw a new answer and render it at the requested zoom
     */
    async generate(zoom: number, rng: Rng = cryptoRng): Promise<RenderedChallenge> {
        assertZoom(zoom);
        const sequence = generateSequence(rng);
        const { width, height } = canvasSize(zoom);

        const svg = this.renderSvg(sequence, zoom, rng);
        const canvas = await this.rasterize(svg, width, height);
        const processed = applyImageEffects(canvas, zoom);
        const image = await encodeCanvas(processed, this.encoder);

        return { sequence, image, zoom, width, height };
    }

    /**
     * Compose every layer into one SVG document, in paint order
     */
    renderSvg(sequence: readonly ArrowSymbol[], zoom: Zoom, rng: Rng = cryptoRng): string {
        if (sequence.length !== SEQUENCE_LENGTH) {
            throw new InvalidArgumentError(`Sequence must hold ${SEQUENCE_LENGTH} symbols, got ${sequence.length}`);
        }
        const { width, height } = canvasSize(zoom);

        let svg = `<svg width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg">`;
        svg += this.drawBackground(width, height, zoom, rng);
        svg += this.drawBadges(sequence, height, zoom, rng);
        svg += this.drawNoiseGlyphs(width, height, zoom, rng);
        svg += this.drawNoiseLines(width, height, zoom, rng);
        svg += this.drawDistortion(width, height, zoom, rng);
        svg += '</svg>';
        return svg;
    }

    private async rasterize(svg: string, width: number, height: number): Promise<RasterCanvas> {
        const { data, info } = await sharp(Buffer.from(svg))
            .flatten({ background: BACKGROUND })
            .removeAlpha()
            .raw()
            .toBuffer({ resolveWithObject: true });

        if (info.width !== width || info.height !== height || info.channels !== 3) {
            throw new Error(
                `Rasterized canvas is ${info.width}x${info.height}x${info.channels}, expected ${width}x${height}x3`
            );
        }
        return { width, height, channels: 3, data };
    }

    private drawBackground(width: number, height: number, zoom: Zoom, rng: Rng): string {
        let layer = `<rect width="${width}" height="${height}" fill="${rgb(BACKGROUND)}" />`;
        const speckles = Math.floor((width * height) / 50);
        for (let i = 0; i < speckles; i++) {
            const x = pickIndex(width, rng);
            const y = pickIndex(height, rng);
            const level = randomInRange(220, 255, rng);
            layer += `<rect x="${x}" y="${y}" width="${zoom}" height="${zoom}" fill="${rgb({ r: level, g: level, b: level })}" />`;
        }
        return layer;
    }

    private drawBadges(sequence: readonly ArrowSymbol[], height: number, zoom: Zoom, rng: Rng): string {
        const size = BADGE_SIZE * zoom;
        const radius = size / 2;
        const shadowOffset = radius / 2;
        const strokeWidth = Math.max(1, Math.floor(zoom / 2));
        const cy = Math.floor(height / 2);

        let defs = '<defs>';
        let layer = '';

        badgeCenters(zoom).forEach((cx, i) => {
            const shadow = randomGray(180, 230, rng);
            const tone1 = randomGray(230, 255, rng);
            const tone2 = randomGray(200, 255, rng);
            const border = randomGray(150, 230, rng);

            defs += `<linearGradient id="badge${i}" gradientUnits="userSpaceOnUse" x1="${cx - radius}" y1="${cy - radius}" x2="${cx + radius}" y2="${cy + radius}">`;
            defs += `<stop offset="0%" stop-color="${rgb(tone1)}" /><stop offset="100%" stop-color="${rgb(tone2)}" />`;
            defs += '</linearGradient>';

            layer += `<circle cx="${cx + shadowOffset}" cy="${cy + shadowOffset}" r="${radius}" fill="${rgb(shadow)}" fill-opacity="0.24" />`;
            layer += `<circle cx="${cx}" cy="${cy}" r="${radius}" fill="url(#badge${i})" stroke="${rgb(border)}" stroke-width="${strokeWidth}" />`;
            layer += this.drawArrow(cx, cy, sequence[i], zoom, rng);
        });

        defs += '</defs>';
        return defs + layer;
    }

    private drawArrow(cx: number, cy: number, symbol: ArrowSymbol, zoom: Zoom, rng: Rng): string {
        const color = pickOne(ARROW_COLORS, rng);
        const points = arrowPolygon(cx, cy, symbol, zoom)
            .map(([x, y]) => `${x},${y}`)
            .join(' ');
        const strokeWidth = Math.max(1, Math.floor(zoom / 2));
        return `<polygon class="arrow" data-direction="${symbol}" points="${points}" fill="${rgb(color)}" stroke="${rgb(brighter(color))}" stroke-width="${strokeWidth}" />`;
    }

    private drawNoiseGlyphs(width: number, height: number, zoom: Zoom, rng: Rng): string {
        const fontSize = 12 * zoom;
        const lineHeight = Math.round(fontSize * 1.15);
        const ascent = Math.round(fontSize * 0.9);
        const minAdvance = Math.floor((fontSize * 0.83) / 3);
        const rows = Math.floor(height / lineHeight) + 1;

        let layer = `<g font-family="Arial, Helvetica, sans-serif" font-weight="bold" font-size="${fontSize}" fill="${rgb(LIGHT_GRAY)}" fill-opacity="0.3">`;
        for (let row = 0; row < rows; row++) {
            const y = row * lineHeight + ascent;
            let x = 0;
            while (x < width) {
                const char = NOISE_CHARS.charAt(pickIndex(NOISE_CHARS.length, rng));
                const rotation = randomInRange(-15, 16, rng);
                layer += `<text x="${x}" y="${y}" transform="rotate(${rotation} ${x} ${y})">${escapeXml(char)}</text>`;
                x += Math.max(Math.floor(glyphWidth(char, fontSize) / 2), minAdvance, 1);
            }
        }
        layer += '</g>';
        return layer;
    }

    private drawNoiseLines(width: number, height: number, zoom: Zoom, rng: Rng): string {
        const count = 3 + pickIndex(zoom, rng);
        const strokeWidth = 1 + (zoom > 2 ? 1 : 0);

        let layer = '';
        for (let i = 0; i < count; i++) {
            const color = pickOne(LINE_COLORS, rng);
            const kind = pickOne(LINE_KINDS, rng);
            let x1 = 0;
            let y1 = 0;
            let x2 = width;
            let y2 = 0;

            switch (kind) {
                case 'horizontal':
                    y1 = y2 = pickIndex(height, rng);
                    break;
                case 'vertical':
                    x1 = x2 = pickIndex(width, rng);
                    y2 = height;
                    break;
                case 'diagonal-down':
                    y1 = pickIndex(height, rng);
                    y2 = pickIndex(height, rng);
                    break;
                case 'diagonal-up':
                    x1 = width;
                    x2 = 0;
                    y1 = pickIndex(height, rng);
                    y2 = pickIndex(height, rng);
                    break;
            }

            layer += `<line class="noise-line" x1="${x1}" y1="${y1}" x2="${x2}" y2="${y2}" stroke="${rgb(color)}" stroke-width="${strokeWidth}" />`;
        }
        return layer;
    }

    private drawDistortion(width: number, height: number, zoom: Zoom, rng: Rng): string {
        let layer = '';

        for (let i = 0; i < 3; i++) {
            const color = randomColor(rng);
            const startY = pickIndex(height, rng);
            const amplitude = randomInRange(5, 15, rng) * zoom;
            const period = randomInRange(20, 40, rng) * zoom;
            const phase = rng() * 2 * Math.PI;

            const points: string[] = [];
            for (let x = 0; x < width; x++) {
                const y = startY + Math.trunc(amplitude * Math.sin((2 * Math.PI * x) / period + phase));
                points.push(`${x},${y}`);
            }
            layer += `<polyline class="wave" points="${points.join(' ')}" fill="none" stroke="${rgb(color)}" stroke-opacity="${(80 / 255).toFixed(3)}" stroke-width="${0.8 * zoom}" />`;
        }

        for (let i = 0; i < 30 * zoom; i++) {
            const color = randomColor(rng);
            const alpha = randomInRange(60, 160, rng) / 255;
            const x = pickIndex(width, rng);
            const y = pickIndex(height, rng);
            const radius = ((1 + pickIndex(3, rng)) * zoom) / 2;
            layer += `<circle class="dot" cx="${x + radius}" cy="${y + radius}" r="${radius}" fill="${rgb(color)}" fill-opacity="${alpha.toFixed(3)}" />`;
        }

        return layer;
    }
}
