// imageDecoder.ts
import { imageSize } from 'image-size';
import { Jimp } from 'jimp';
import { DecodeError, errorMessage } from './errors.js';
import type { RasterImage } from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Decoder');

const BASE64_BODY = /^[A-Za-z0-9+/]+={0,2}$/;

export type DecodeOptions = {
    /** Longest side allowed before the image is downscaled. */
    maxImageDimension: number;
    /** Images whose header declares more pixels than this are rejected undecoded. */
    maxImagePixels: number;
};

/** Splits `data:<mime>;base64,<body>` and returns the raw bytes. */
export function parseDataUri(payload: string): Buffer {
    if (!payload.startsWith('data:')) {
        throw new DecodeError('Image payload must be a data URI (missing "data:" header)');
    }
    const comma = payload.indexOf(',');
    if (comma === -1) {
        throw new DecodeError('Image payload is missing the "," delimiter after its header');
    }
    const body = payload.slice(comma + 1).replace(/\s+/g, '');
    if (body.length === 0 || !BASE64_BODY.test(body)) {
        throw new DecodeError('Image payload is not valid base64');
    }
    return Buffer.from(body, 'base64');
}

function probeHeader(bytes: Buffer) {
    try {
        return imageSize(bytes);
    } catch (err) {
        throw new DecodeError(`Image format is not recognized: ${errorMessage(err)}`, { cause: err });
    }
}

/** Width and height as declared by the file header, without decoding pixels. */
export function readDeclaredSize(bytes: Buffer): { width: number; height: number } {
    const size = probeHeader(bytes);
    if (!size.width || !size.height) {
        throw new DecodeError('Image header does not declare its dimensions');
    }
    return { width: size.width, height: size.height };
}

export function fitWithin(width: number, height: number, maxDimension: number): { w: number; h: number } {
    const longest = Math.max(width, height);
    if (longest <= maxDimension) return { w: width, h: height };
    const scale = maxDimension / longest;
    return {
        w: Math.max(1, Math.round(width * scale)),
        h: Math.max(1, Math.round(height * scale)),
    };
}

// ── Decode a data-URI screenshot into an RGB raster (alpha dropped) ──
export async function decodeImagePayload(payload: string, options: DecodeOptions): Promise<RasterImage> {
    const bytes = parseDataUri(payload);

    const declared = readDeclaredSize(bytes);
    if (declared.width * declared.height > options.maxImagePixels) {
        throw new DecodeError(
            `Image is ${declared.width}x${declared.height}, which exceeds the ${options.maxImagePixels} pixel limit`
        );
    }

    let image: Awaited<ReturnType<typeof Jimp.read>>;
    try {
        image = await Jimp.read(bytes);
    } catch (err) {
        throw new DecodeError(`Image data could not be decoded: ${errorMessage(err)}`, { cause: err });
    }

    if (image.width === 0 || image.height === 0) {
        throw new DecodeError('Decoded image is empty');
    }

    const target = fitWithin(image.width, image.height, options.maxImageDimension);
    if (target.w !== image.width || target.h !== image.height) {
        log.info(`Downscaling ${image.width}x${image.height} → ${target.w}x${target.h}`);
        image.resize({ w: target.w, h: target.h });
    }

    const { width, height } = image;
    const rgba = image.bitmap.data;
    const data = new Uint8Array(width * height * 3);
    for (let src = 0, dst = 0; dst < data.length; src += 4, dst += 3) {
        data[dst] = rgba[src];
        data[dst + 1] = rgba[src + 1];
        data[dst + 2] = rgba[src + 2];
    }

    log.debug(`Decoded ${width}x${height} image (${bytes.length} bytes)`);
    return { width, height, data };
}
