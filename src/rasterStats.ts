// rasterStats.ts
import type { RasterImage } from './types.js';

export type GrayImage = {
    readonly width: number;
    readonly height: number;
    readonly data: Uint8Array;
};

/** ITU-R BT.601 luma, rounded to a byte per pixel. */
export function toGrayscale(image: RasterImage): GrayImage {
    const { width, height, data } = image;
    const gray = new Uint8Array(width * height);
    for (let i = 0, p = 0; i < gray.length; i++, p += 3) {
        gray[i] = Math.round(0.299 * data[p] + 0.587 * data[p + 1] + 0.114 * data[p + 2]);
    }
    return { width, height, data: gray };
}

export type Moments = { mean: number; variance: number; std: number };

/**
 * Population mean/variance over a rectangular window of a grayscale image.
 * Defaults to the whole image.
 */
export function regionMoments(
    gray: GrayImage,
    x0 = 0,
    y0 = 0,
    w = gray.width,
    h = gray.height
): Moments {
    const count = w * h;
    if (count <= 0) return { mean: 0, variance: 0, std: 0 };

    let sum = 0;
    let sumSq = 0;
    for (let y = y0; y < y0 + h; y++) {
        let idx = y * gray.width + x0;
        for (let x = 0; x < w; x++, idx++) {
            const v = gray.data[idx];
            sum += v;
            sumSq += v * v;
        }
    }
    const mean = sum / count;
    // Clamp tiny negative values from floating-point cancellation on flat regions.
    const variance = Math.max(0, sumSq / count - mean * mean);
    return { mean, variance, std: Math.sqrt(variance) };
}

export function packRgb(r: number, g: number, b: number): number {
    return (r << 16) | (g << 8) | b;
}

export function unpackRgb(packed: number): [number, number, number] {
    return [(packed >> 16) & 0xFF, (packed >> 8) & 0xFF, packed & 0xFF];
}

export function rgbToHex(r: number, g: number, b: number): string {
    return `#${r.toString(16).padStart(2, '0')}${g.toString(16).padStart(2, '0')}${b.toString(16).padStart(2, '0')}`.toUpperCase();
}
