import { Jimp } from 'jimp';
import type { EdgeMap } from '../src/edgeDetection.js';
import type { GrayImage } from '../src/rasterStats.js';
import type { RasterImage, RgbTriple } from '../src/types.js';

export function solidRaster(width: number, height: number, rgb: RgbTriple = [0, 0, 0]): RasterImage {
    const data = new Uint8Array(width * height * 3);
    for (let p = 0; p < data.length; p += 3) {
        data[p] = rgb[0];
        data[p + 1] = rgb[1];
        data[p + 2] = rgb[2];
    }
    return { width, height, data };
}

export function fillRect(image: RasterImage, x0: number, y0: number, w: number, h: number, rgb: RgbTriple): void {
    for (let y = y0; y < y0 + h; y++) {
        for (let x = x0; x < x0 + w; x++) {
            const p = (y * image.width + x) * 3;
            image.data[p] = rgb[0];
            image.data[p + 1] = rgb[1];
            image.data[p + 2] = rgb[2];
        }
    }
}

export function grayImage(width: number, height: number, value = 0): GrayImage {
    return { width, height, data: new Uint8Array(width * height).fill(value) };
}

/** Mutable edge map builder; call `build()` to get the counted map. */
export class EdgeCanvas {
    readonly data: Uint8Array;

    constructor(readonly width: number, readonly height: number) {
        this.data = new Uint8Array(width * height);
    }

    set(x: number, y: number): this {
        this.data[y * this.width + x] = 1;
        return this;
    }

    /** One-pixel outline with corners (x0, y0) and (x1, y1), inclusive. */
    outline(x0: number, y0: number, x1: number, y1: number): this {
        for (let x = x0; x <= x1; x++) this.set(x, y0).set(x, y1);
        for (let y = y0; y <= y1; y++) this.set(x0, y).set(x1, y);
        return this;
    }

    hline(x0: number, x1: number, y: number): this {
        for (let x = x0; x <= x1; x++) this.set(x, y);
        return this;
    }

    build(): EdgeMap {
        const edgeCount = this.data.reduce((sum, v) => sum + v, 0);
        return { width: this.width, height: this.height, data: this.data, edgeCount };
    }
}

/** PNG data URI of a black canvas with an optional white square. */
export async function pngDataUri(
    width: number,
    height: number,
    square?: { x: number; y: number; size: number }
): Promise<string> {
    const image = new Jimp({ width, height, color: 0x000000ff });
    if (square) {
        for (let y = square.y; y < square.y + square.size; y++) {
            for (let x = square.x; x < square.x + square.size; x++) {
                image.setPixelColor(0xffffffff, x, y);
            }
        }
    }
    return image.getBase64('image/png');
}

/** A PNG signature and IHDR chunk only: the header claims a size, no pixel data follows. */
export function pngHeader(width: number, height: number): Buffer {
    const bytes = Buffer.alloc(33);
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(bytes, 0);
    bytes.writeUInt32BE(13, 8);
    bytes.write('IHDR', 12, 'ascii');
    bytes.writeUInt32BE(width, 16);
    bytes.writeUInt32BE(height, 20);
    bytes[24] = 8;
    bytes[25] = 6;
    return bytes;
}
