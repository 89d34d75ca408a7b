// tesseractRecognizer.ts
import { createRequire } from 'node:module';
import path from 'node:path';
import { Jimp } from 'jimp';
import { createWorker, OEM, type Worker } from 'tesseract.js';
import { RecognitionError, errorMessage } from './errors.js';
import type { TextRecognizer, RecognizedWord } from './textAnalyzer.js';
import type { RasterImage } from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Tesseract');
const require = createRequire(import.meta.url);

// LSTM models shipped inside each @tesseract.js-data/<lang> package.
const LANGUAGE_DATA_VARIANT = '4.0.0_best_int';

export type TesseractOptions = {
    language: string;
    langPath?: string | undefined;
    cachePath: string;
};

/** Local traineddata directory for one language, taken from node_modules. */
export function resolveLanguageDataPath(language: string): string {
    if (language.includes('+')) {
        throw new RecognitionError(`OCR_LANG_PATH must be set to use several languages (${language})`);
    }
    let manifest: string;
    try {
        manifest = require.resolve(`@tesseract.js-data/${language}/package.json`);
    } catch (err) {
        throw new RecognitionError(
            `Language data for "${language}" is not installed (npm install @tesseract.js-data/${language})`,
            { cause: err }
        );
    }
    return path.join(path.dirname(manifest), LANGUAGE_DATA_VARIANT);
}

export async function encodePng(image: RasterImage): Promise<Buffer> {
    const rgba = Buffer.alloc(image.width * image.height * 4);
    for (let src = 0, dst = 0; src < image.data.length; src += 3, dst += 4) {
        rgba[dst] = image.data[src];
        rgba[dst + 1] = image.data[src + 1];
        rgba[dst + 2] = image.data[src + 2];
        rgba[dst + 3] = 0xFF;
    }
    const bitmap = Jimp.fromBitmap({ data: rgba, width: image.width, height: image.height });
    return bitmap.getBuffer('image/png');
}

/** tesseract.js worker, created on first use and reused until reset. */
export class TesseractRecognizer implements TextRecognizer {
    private worker: Promise<Worker> | null = null;

    constructor(private readonly options: TesseractOptions) {}

    private async startWorker(): Promise<Worker> {
        const { language, cachePath } = this.options;
        const langPath = this.options.langPath ?? resolveLanguageDataPath(language);
        log.info(`Starting OCR worker (${language}, data from ${langPath})`);
        return createWorker(language, OEM.LSTM_ONLY, { langPath, cachePath });
    }

    private getWorker(): Promise<Worker> {
        if (!this.worker) {
            // A failed start must not poison later requests.
            this.worker = this.startWorker().catch((err: unknown) => {
                this.worker = null;
                throw err;
            });
        }
        return this.worker;
    }

    async recognize(image: RasterImage): Promise<RecognizedWord[]> {
        try {
            const worker = await this.getWorker();
            const png = await encodePng(image);
            const { data } = await worker.recognize(png);
            return data.words.map(word => ({
                text: word.text,
                confidence: Math.round(word.confidence),
                position: { x: word.bbox.x0, y: word.bbox.y0 },
                dimensions: { width: word.bbox.x1 - word.bbox.x0, height: word.bbox.y1 - word.bbox.y0 },
            }));
        } catch (err) {
            if (err instanceof RecognitionError) throw err;
            throw new RecognitionError(`Tesseract failed: ${errorMessage(err)}`, { cause: err });
        }
    }

    /** Drops the current worker, abandoning any job it is still running. */
    async reset(): Promise<void> {
        if (!this.worker) return;
        const pending = this.worker;
        this.worker = null;
        try {
            await (await pending).terminate();
        } catch (err) {
            log.warn(`OCR worker did not shut down cleanly: ${errorMessage(err)}`);
        }
    }
}
