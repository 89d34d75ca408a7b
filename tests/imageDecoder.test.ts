import { describe, it, expect } from 'vitest';
import { Jimp } from 'jimp';
import { DecodeError } from '../src/errors.js';
import { decodeImagePayload, fitWithin, parseDataUri, readDeclaredSize, type DecodeOptions } from '../src/imageDecoder.js';
import { pngDataUri, pngHeader } from './helpers.js';

const options: DecodeOptions = { maxImageDimension: 2000, maxImagePixels: 50_000_000 };

describe('parseDataUri', () => {
    it('rejects a payload without a data: header', () => {
        expect(() => parseDataUri('iVBORw0KGgo=')).toThrow(DecodeError);
    });

    it('rejects a header without the comma delimiter', () => {
        expect(() => parseDataUri('data:image/png;base64')).toThrow(/delimiter/);
    });

    it('rejects a non-base64 body', () => {
        expect(() => parseDataUri('data:image/png;base64,@@@')).toThrow('Image payload is not valid base64');
    });

    it('rejects an empty body', () => {
        expect(() => parseDataUri('data:image/png;base64,')).toThrow(DecodeError);
    });

    it('returns the decoded bytes', () => {
        expect(parseDataUri('data:text/plain;base64,aGVsbG8=').toString('utf8')).toBe('hello');
    });
});

describe('fitWithin', () => {
    it('keeps images that already fit', () => {
        expect(fitWithin(800, 600, 2000)).toEqual({ w: 800, h: 600 });
    });

    it('scales the longest side down to the limit', () => {
        expect(fitWithin(300, 150, 100)).toEqual({ w: 100, h: 50 });
    });
});

describe('readDeclaredSize', () => {
    it('reads the dimensions from a PNG header', () => {
        expect(readDeclaredSize(pngHeader(1280, 720))).toEqual({ width: 1280, height: 720 });
    });

    it('rejects bytes of an unknown format', () => {
        expect(() => readDeclaredSize(Buffer.from('definitely not a png'))).toThrow(DecodeError);
    });
});

describe('decodeImagePayload', () => {
    it('decodes a PNG into an RGB raster', async () => {
        const uri = await new Jimp({ width: 4, height: 3, color: 0xff0000ff }).getBase64('image/png');
        const raster = await decodeImagePayload(uri, options);

        expect(raster.width).toBe(4);
        expect(raster.height).toBe(3);
        expect(raster.data.length).toBe(4 * 3 * 3);
        expect([...raster.data.slice(0, 3)]).toEqual([255, 0, 0]);
    });

    it('fails with DecodeError when the bytes are not an image', async () => {
        const uri = `data:image/png;base64,${Buffer.from('definitely not a png').toString('base64')}`;
        await expect(decodeImagePayload(uri, options)).rejects.toBeInstanceOf(DecodeError);
    });

    it('downscales images larger than the configured dimension', async () => {
        const uri = await pngDataUri(300, 150);
        const raster = await decodeImagePayload(uri, { ...options, maxImageDimension: 100 });

        expect(raster.width).toBe(100);
        expect(raster.height).toBe(50);
        expect(raster.data.length).toBe(100 * 50 * 3);
    });

    it('rejects a header declaring more pixels than allowed before decoding', async () => {
        const uri = `data:image/png;base64,${pngHeader(20000, 20000).toString('base64')}`;

        await expect(decodeImagePayload(uri, options)).rejects.toThrow(
            'Image is 20000x20000, which exceeds the 50000000 pixel limit'
        );
    });

    it('applies the pixel limit to real images too', async () => {
        const uri = await pngDataUri(100, 100);

        await expect(decodeImagePayload(uri, { ...options, maxImagePixels: 9999 })).rejects.toBeInstanceOf(DecodeError);
    });
});
